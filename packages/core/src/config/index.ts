export { RelayConfigSchema, LogLevelSchema, DEFAULT_CONFIG, type RelayConfig, type ProviderConfig, type LogLevel } from './schema.js';
export { loadConfig, resolveConfig, deepMerge, envCredentialSource, type CredentialSource, type LoadConfigOptions } from './loader.js';
export { validateConfig, normalizeConfig, checkConfig, type NormalizedConfig, type ValidationResult, type ValidationError, type ValidationWarning } from './validator.js';
export { resolveRelayHome, resolveConfigPath, CONFIG_FILE_NAME } from './paths.js';
