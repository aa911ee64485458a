export {
  DEFAULT_BUFFER_SIZE,
  DEFAULT_MULTICAST_GROUP,
  DEFAULT_MULTICAST_BIND_ADDRESS,
  DEFAULT_MULTICAST_TTL,
  DEFAULT_COMMAND_HOST,
  DEFAULT_TIMEOUTS,
} from './defaults.js';

export {
  EndpointSchema,
  MulticastGroupSchema,
  RemoteExecutionConfigSchema,
  ProjectSettingsSchema,
  jsonSchemas,
  type Endpoint,
  type RemoteExecutionConfig,
  type ProjectSettings,
} from './schemas.js';

export {
  createRemoteExecutionConfig,
  validateRemoteExecutionConfig,
  resolveCommandAddress,
  parseEndpoint,
  formatEndpoint,
  describeConfig,
  type RemoteExecutionConfigOptions,
} from './remote-config.js';

export {
  loadProjectConfig,
  readProjectSettings,
  parseProjectSettings,
  settingsToConfigOptions,
  getProjectName,
  getSettingsPath,
  PROJECT_FILE_EXTENSION,
  SETTINGS_DIR,
  SETTINGS_FILE,
  SETTINGS_SECTION,
} from './project-settings.js';
