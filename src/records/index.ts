export {
  RecordStore,
  type RecordStoreGateway,
  type RecordStoreOptions,
} from "./store.js";

export {
  RECORD_STORE_SCHEMA,
  RECORDED_PROMPT_TYPES,
  type DemographicUser,
  type DeviceInfo,
  type InputPromptDefinition,
  type ItemCounts,
  type ItemRecord,
  type PinIdentity,
  type ProjectRecord,
  type PromptRecord,
  type SessionRecord,
  type StatRecord,
} from "./schema.js";
