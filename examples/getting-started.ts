import { ApiKey, OpenCloudEnvironment, PreconditionFailedError } from "../src/index.js";

const config = OpenCloudEnvironment.parse();
if (!config.apiKey) {
	throw new Error("Set OPENCLOUD_API_KEY to talk to Open Cloud.");
}

const experienceId = Number(process.env.OPENCLOUD_EXPERIENCE_ID);
if (!Number.isInteger(experienceId)) {
	throw new Error("Set OPENCLOUD_EXPERIENCE_ID so we know which experience to inspect.");
}

const apiKey = new ApiKey({ ...config, apiKey: config.apiKey });
const experience = apiKey.getExperience(experienceId);

const info = await experience.fetchInfo();
console.log("Experience:", info.name);

// List the first few data stores in the experience.
for await (const store of experience.listDataStores({ limit: 5 })) {
	console.log("Data store:", store.name, store.created);
}

const store = experience.getDataStore("getting-started");

// Only create the entry if nobody has written it yet.
await store
	.setEntry("greeting", { text: "hello" }, { exclusiveCreate: true })
	.catch((error) => {
		if (!(error instanceof PreconditionFailedError)) {
			throw error;
		}
		console.log("Entry already exists with value", error.value);
	});

const { value, info: entryInfo } = await store.getEntry("greeting");
console.log("greeting = %o (version %s)", value, entryInfo.version);
