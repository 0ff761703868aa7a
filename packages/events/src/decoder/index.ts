export {
  readFields,
  definePayloadDecoder,
  defineExternalDecoder,
  type PayloadDecoder,
} from "./payload.js";
export {
  EventRegistry,
  getDefaultRegistry,
  type RegistryOptions,
  type RegisteredEventType,
} from "./registry.js";
