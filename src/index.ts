/** Top-level entrypoint for API key access. */
export { ApiKey } from "./apiKey.js";
/** Client configuration and retry-related types. */
export type {
	ClientOptions,
	OpenCloudEnvironmentConfig,
	RequestOptions,
	RetryConfig,
} from "./common.js";
export { OpenCloudEnvironment } from "./common.js";
export type {
	Asset,
	AssetFile,
	AssetType,
	AssetVersion,
	ModerationStatus,
	UploadAssetArgs,
} from "./creator.js";
export { Creator } from "./creator.js";
/** Data store argument and result types. */
export type {
	EntryInfo,
	EntryVersion,
	JsonValue,
	ListedEntry,
	ListVersionsArgs,
	SetEntryArgs,
	SortedEntry,
	SortKeysArgs,
} from "./datastore.js";
export { DataStore, OrderedDataStore } from "./datastore.js";
/**
 * Rich error types exposed by the SDK.
 *
 * - {@link OpenCloudError} is the base error type.
 * - Other types specialize common HTTP statuses and upload failures.
 */
export {
	InvalidAssetError,
	InvalidCodeError,
	InvalidKeyError,
	ModeratedTextError,
	NetworkError,
	NotFoundError,
	OpenCloudError,
	OperationTimeoutError,
	PermissionDeniedError,
	PreconditionFailedError,
	RateLimitedError,
	ServiceUnavailableError,
} from "./error.js";
export type {
	ExperienceAgeRating,
	ExperienceInfo,
	ExperienceOwner,
	ListDataStoresArgs,
	PlaceInfo,
	SocialLink,
	SocialLinkKind,
} from "./experience.js";
export { Experience, Place } from "./experience.js";
export type {
	GroupInfo,
	GroupJoinRequest,
	GroupMember,
	GroupRole,
	GroupRolePermissions,
	GroupShout,
} from "./group.js";
export { Group } from "./group.js";
/**
 * Low-level request primitives, for endpoints the resource wrappers don't
 * cover.
 */
export type {
	HttpMethod,
	HttpResponse,
	QueryParams,
	QueryValue,
	SendRequestOptions,
} from "./lib/http.js";
export { BASE_URL, sendRequest } from "./lib/http.js";
export type {
	OperationResolver,
	OperationStatus,
	WaitOptions,
} from "./lib/operation.js";
export { Operation } from "./lib/operation.js";
export type { IterateRequestOptions } from "./lib/paginate.js";
export { iterateRequest } from "./lib/paginate.js";
/** Redacted credential wrapper type. */
export type { Redacted } from "./lib/redacted.js";
export type { FetchLike, HttpSessionOptions } from "./lib/session.js";
export { closeSession, getSession, HttpSession } from "./lib/session.js";
export type {
	ListSortedMapKeysArgs,
	ReadQueueItemsArgs,
	SetSortedMapKeyArgs,
	SortedMapEntry,
} from "./memoryStore.js";
export { MemoryStoreQueue, SortedMap } from "./memoryStore.js";
/** OAuth2 app and token types. */
export type {
	AccessTokenInfo,
	AuthorizedResources,
	GenerateUriArgs,
	OAuth2AppOptions,
	UserinfoResult,
} from "./oauth2.js";
export { AccessToken, OAuth2App, PartialAccessToken } from "./oauth2.js";
export type { GenerateHeadshotArgs, HeadshotSize, UserInfo } from "./user.js";
export { User } from "./user.js";
export { VERSION } from "./version.js";
