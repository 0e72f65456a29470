export { MemoryModelStore } from "./memory_model_store";
