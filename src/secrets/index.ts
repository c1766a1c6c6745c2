export {
  envKeyFor,
  parseReference,
  type ResolvedSecret,
  type SecretReference,
  type SecretSource,
  SecretsProvider,
  type SecretsProviderOpts,
} from "./provider.js";
export {
  createSecretsComponent,
  type SecretsComponent,
  type SecretsComponentDeps,
  type SecretsConfig,
  type SecretsConfigInput,
  SecretsConfigSchema,
  type SecretsDiscovery,
  type SecretsHousekeeping,
  type SecretsProcessing,
} from "./secrets-component.js";
export * from "./store.js";
export { type AppRoleLogin, VaultClient, type VaultClientOpts } from "./vault-client.js";
