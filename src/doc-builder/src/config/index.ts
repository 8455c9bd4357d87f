export {
  ConfigResolver,
  ConfigResolverOptions,
  ConfigLayer,
  ResolvedPipelineConfig,
  DEFAULT_PIPELINE_CONFIG,
  ENV_KEYS,
  RC_FILES,
  mergeConfigLayers,
  parseEnvFile,
  envLayerValues,
} from './ConfigResolver';
