export { CREDENTIAL_PATHS, openSecretsStore, resolveCredentials } from "./credentials.js";
export { loadSettings, type Settings, SettingsSchema } from "./settings.js";
