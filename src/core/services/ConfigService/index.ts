export {
  ConfigServiceTag,
  ConfigServiceLive,
  ConfigLoadError,
  renderDefaultConfig,
  stripLineComments
} from "./ConfigService";
export type { ConfigService, LoadedConfig } from "./ConfigService";
