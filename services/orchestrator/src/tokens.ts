export const APP_CONFIG = Symbol("APP_CONFIG");
export const CASE_REPOSITORY = Symbol("CASE_REPOSITORY");
export const STORAGE_SERVICE = Symbol("STORAGE_SERVICE");
export const LLM_CLIENT = Symbol("LLM_CLIENT");
export const FRAME_SOURCE = Symbol("FRAME_SOURCE");
export const ADAPTER_REGISTRY = Symbol("ADAPTER_REGISTRY");
