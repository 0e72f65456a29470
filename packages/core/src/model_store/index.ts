export type { ModelStore, ModelListener } from "./model_store";
