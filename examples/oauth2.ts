import { OAuth2App } from "../src/index.js";

const clientId = Number(process.env.OPENCLOUD_CLIENT_ID);
const clientSecret = process.env.OPENCLOUD_CLIENT_SECRET;
if (!Number.isInteger(clientId) || !clientSecret) {
	throw new Error("Set OPENCLOUD_CLIENT_ID and OPENCLOUD_CLIENT_SECRET.");
}

const app = new OAuth2App({
	clientId,
	clientSecret,
	redirectUri: "http://localhost:3000/callback",
});

const code = process.env.OPENCLOUD_AUTH_CODE;
const verifier = process.env.OPENCLOUD_CODE_VERIFIER;

if (!code || !verifier) {
	// Step 1: send the user to Roblox and keep the verifier for step 2.
	const codeVerifier = app.generateCodeVerifier();
	console.log("Code verifier:", codeVerifier);
	console.log(
		"Authorize at:",
		app.generateUri(["openid", "profile"], { codeVerifier, state: "example" }),
	);
} else {
	// Step 2: exchange the code from the redirect.
	const token = await app.exchangeCode(code, verifier);
	const userinfo = await token.fetchUserinfo();
	console.log("Signed in as %s (%d)", userinfo.username, userinfo.user.id);

	const resources = await token.fetchResources();
	console.log(
		"Authorized experiences:",
		resources.experiences.map((experience) => experience.id),
	);
	await token.revoke();
}
