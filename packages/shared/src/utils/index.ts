export { generateId } from './id.js';
export { monotonicNow, isoNow, clockTime } from './clock.js';
export {
  CostwiseError,
  TransportError,
  StaleInterruptionError,
  ToolNotFoundError,
  ProviderNotAvailableError,
  ConfigError,
  errorMessage,
} from './errors.js';
export type { TransportComponent } from './errors.js';
