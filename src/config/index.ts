export {
  AccountSchema,
  CompressionSchema,
  CompressLevelSchema,
  DigestAuthSchema,
  GatewayConfigSchema,
  HideFileInDirSchema,
  type AccountConfig,
  type CompressionConfig,
  type CompressLevel,
  type DigestAuthConfig,
  type GatewayConfig,
  type HideFileInDirConfig,
} from './schema.js';
export { getDefaultConfig, loadConfigFile, parseConfig } from './loader.js';
