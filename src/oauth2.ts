import { createHash, randomInt } from "node:crypto";
import type { RequestOptions, RetryConfig } from "./common.js";
import { errorMessageOf, InvalidCodeError } from "./error.js";
import { Experience } from "./experience.js";
import { Group } from "./group.js";
import { HttpClient } from "./lib/client.js";
import type { HttpResponse, QueryParams } from "./lib/http.js";
import * as Redacted from "./lib/redacted.js";
import type { HttpSession } from "./lib/session.js";
import { User } from "./user.js";
import {
	type JsonObject,
	isRecord,
	readArray,
	readBoolean,
	readNumber,
	readOptionalNumber,
	readOptionalString,
	readRecord,
	readString,
} from "./utils.js";

const AUTHORIZE_URL = "https://apis.roblox.com/oauth/v1/authorize";

const CODE_VERIFIER_ALPHABET =
	"ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-._~";

export type OAuth2AppOptions = {
	clientId: number;
	clientSecret: string;
	/** Must match one of the redirect URIs registered for the app. */
	redirectUri: string;
	retry?: RetryConfig;
	timeoutMillis?: number;
	session?: HttpSession;
};

export type GenerateUriArgs = {
	/** Returned unchanged on the redirect; use it to tie the callback to the user's session. */
	state?: string;
	/** Sent as an S256 code challenge. Pass the same value to {@link OAuth2App.exchangeCode}. */
	codeVerifier?: string;
	/** @default true */
	generateCode?: boolean;
};

export type UserinfoResult = {
	user: User;
	username: string | undefined;
	displayName: string | undefined;
	headshotUri: string | undefined;
	createdAt: Date | undefined;
};

export type AccessTokenInfo = {
	/** True until the token expires, even if the user revoked the authorization. */
	active: boolean;
	id: string;
	clientId: number;
	userId: number;
	scope: string[];
	expiresAt: Date;
	issuedAt: Date;
};

export type AuthorizedResources = {
	experiences: Experience[];
	/** Users and groups the app may upload assets for. */
	accounts: Array<User | Group>;
};

function fromUnixSeconds(seconds: number): Date {
	return new Date(seconds * 1000);
}

/**
 * An access token without the details only known when it was issued.
 * Resource wrappers obtained from it authenticate with the token.
 */
export class PartialAccessToken {
	protected readonly client: HttpClient;

	constructor(
		public readonly app: OAuth2App,
		public readonly token: string,
	) {
		this.client = app.clientFor(token);
	}

	/** Requires the `openid` scope; `profile` adds the name and picture fields. */
	public async fetchUserinfo(options?: RequestOptions): Promise<UserinfoResult> {
		const { body } = await this.client.request("GET", "oauth/v1/userinfo", {
			expectedStatus: [200],
			signal: options?.signal,
		});
		const data = readRecord(body);
		const createdAt = readOptionalNumber(data, "created_at");
		return {
			user: new User(this.client, readNumber(data, "id" in data ? "id" : "sub")),
			username: readOptionalString(data, "preferred_username"),
			displayName: readOptionalString(data, "nickname"),
			headshotUri: readOptionalString(data, "picture"),
			createdAt: createdAt === undefined ? undefined : fromUnixSeconds(createdAt),
		};
	}

	/** Lists the experiences and accounts the user authorized. */
	public async fetchResources(options?: RequestOptions): Promise<AuthorizedResources> {
		const { body } = await this.app.post(
			"oauth/v1/token/resources",
			{ token: this.token },
			options,
		);
		const experiences: Experience[] = [];
		const accounts: Array<User | Group> = [];
		for (const item of readArray(readRecord(body), "resource_infos")) {
			const info = readRecord(item, "resource_infos[]");
			const owner = readRecord(info.owner, "owner");
			const resources = readRecord(info.resources, "resources");
			const { universe, creator } = resources;
			if (isRecord(universe)) {
				for (const id of readArray(universe, "ids")) {
					experiences.push(new Experience(this.client, Number(id)));
				}
			}
			if (isRecord(creator)) {
				for (const id of readArray(creator, "ids")) {
					const account = this.accountFor(String(id), owner);
					if (account) accounts.push(account);
				}
			}
		}
		return { experiences, accounts };
	}

	public async fetchTokenInfo(options?: RequestOptions): Promise<AccessTokenInfo> {
		const { body } = await this.app.post(
			"oauth/v1/token/introspect",
			{ token: this.token },
			options,
		);
		const data = readRecord(body);
		return {
			active: readBoolean(data, "active"),
			id: readString(data, "jti"),
			clientId: readNumber(data, "client_id"),
			userId: readNumber(data, "sub"),
			scope: readString(data, "scope").split(" "),
			expiresAt: fromUnixSeconds(readNumber(data, "exp")),
			issuedAt: fromUnixSeconds(readNumber(data, "iat")),
		};
	}

	public revoke(options?: RequestOptions): Promise<void> {
		return this.app.revokeToken(this.token, options);
	}

	// Creator ids are "U" for the owning user, or "U{id}"/"G{id}".
	private accountFor(creatorId: string, owner: JsonObject): User | Group | undefined {
		if (creatorId === "U") {
			return new User(this.client, readNumber(owner, "id"));
		}
		if (creatorId.startsWith("U")) {
			return new User(this.client, Number(creatorId.slice(1)));
		}
		if (creatorId.startsWith("G")) {
			return new Group(this.client, Number(creatorId.slice(1)));
		}
		return undefined;
	}
}

/**
 * A freshly issued access token together with its refresh token.
 */
export class AccessToken extends PartialAccessToken {
	public readonly refreshToken: string;
	public readonly scope: string[];
	/** Approximate, computed from `expires_in` when the token was received. */
	public readonly expiresAt: Date;
	/** The raw ID token, present with the `openid` scope. Its signature is not verified. */
	public readonly idToken: string | undefined;

	constructor(app: OAuth2App, payload: JsonObject) {
		super(app, readString(payload, "access_token"));
		this.refreshToken = readString(payload, "refresh_token");
		this.scope = readString(payload, "scope").split(" ");
		this.expiresAt = new Date(Date.now() + readNumber(payload, "expires_in") * 1000);
		this.idToken = readOptionalString(payload, "id_token");
	}

	public revokeRefreshToken(options?: RequestOptions): Promise<void> {
		return this.app.revokeToken(this.refreshToken, options);
	}
}

/**
 * An OAuth2 app. Builds authorization URIs and turns codes and refresh
 * tokens into access tokens.
 *
 * @example
 * ```ts
 * const app = new OAuth2App({ clientId: 1234, clientSecret: "test-secret", redirectUri: "https://example.com/callback" });
 * const verifier = app.generateCodeVerifier();
 * const uri = app.generateUri(["openid", "profile"], { state, codeVerifier: verifier });
 * // ...after the redirect:
 * const token = await app.exchangeCode(code, verifier);
 * ```
 */
export class OAuth2App {
	public readonly id: number;
	public readonly redirectUri: string;
	private readonly secret: Redacted.Redacted;
	private readonly client: HttpClient;

	constructor(options: OAuth2AppOptions) {
		this.id = options.clientId;
		this.redirectUri = options.redirectUri;
		this.secret = Redacted.make(options.clientSecret);
		this.client = new HttpClient({
			retry: options.retry,
			timeoutMillis: options.timeoutMillis,
			session: options.session,
		});
	}

	/** A client for this app's settings authenticated with `token`. */
	public clientFor(token: string): HttpClient {
		return this.client.withCredential(`Bearer ${token}`);
	}

	/**
	 * Random code verifier for PKCE, drawn from letters, digits and `-._~`.
	 * Lengths between 43 and 128 are accepted by the authorization server.
	 */
	public generateCodeVerifier(length = 128): string {
		let verifier = "";
		for (let i = 0; i < length; i++) {
			verifier += CODE_VERIFIER_ALPHABET.charAt(randomInt(CODE_VERIFIER_ALPHABET.length));
		}
		return verifier;
	}

	public generateUri(scope: string | readonly string[], args: GenerateUriArgs = {}): string {
		const params = new URLSearchParams({
			client_id: String(this.id),
			scope: typeof scope === "string" ? scope : scope.join(" "),
		});
		if (args.state !== undefined) params.set("state", args.state);
		params.set("redirect_uri", this.redirectUri);
		params.set("response_type", (args.generateCode ?? true) ? "code" : "none");
		if (args.codeVerifier) {
			params.set(
				"code_challenge",
				createHash("sha256").update(args.codeVerifier).digest("base64url"),
			);
			params.set("code_challenge_method", "S256");
		}
		return `${AUTHORIZE_URL}?${params}`;
	}

	/**
	 * Wraps a stored access token string. Access tokens expire after 15
	 * minutes, so prefer storing the refresh token.
	 */
	public fromAccessTokenString(accessToken: string): PartialAccessToken {
		return new PartialAccessToken(this, accessToken);
	}

	/**
	 * @throws InvalidCodeError when the code is invalid, expired or already used.
	 */
	public async exchangeCode(
		code: string,
		codeVerifier?: string,
		options?: RequestOptions,
	): Promise<AccessToken> {
		const { status, body } = await this.post(
			"oauth/v1/token",
			{
				redirect_uri: this.redirectUri,
				grant_type: "authorization_code",
				code_verifier: codeVerifier,
				code,
			},
			options,
			[200, 401],
		);
		if (status === 401) {
			const description = isRecord(body)
				? readOptionalString(body, "error_description")
				: undefined;
			throw new InvalidCodeError({
				message: description ?? errorMessageOf(body),
				status,
				body,
			});
		}
		return new AccessToken(this, readRecord(body));
	}

	/** Exchanges a refresh token for a new access token and refresh token. */
	public async refreshToken(
		refreshToken: string,
		options?: RequestOptions,
	): Promise<AccessToken> {
		const { body } = await this.post(
			"oauth/v1/token",
			{
				redirect_uri: this.redirectUri,
				grant_type: "refresh_token",
				refresh_token: refreshToken,
			},
			options,
		);
		return new AccessToken(this, readRecord(body));
	}

	/** Revokes the authorization behind an access or refresh token. */
	public async revokeToken(token: string, options?: RequestOptions): Promise<void> {
		await this.post("oauth/v1/token/revoke", { token }, options);
	}

	/** Form POST carrying the app's client credentials. */
	public post(
		path: string,
		form: QueryParams,
		options?: RequestOptions,
		expectedStatus: readonly number[] = [200],
	): Promise<HttpResponse> {
		return this.client.request("POST", path, {
			form: {
				client_id: this.id,
				client_secret: Redacted.value(this.secret),
				...form,
			},
			expectedStatus,
			signal: options?.signal,
		});
	}
}
