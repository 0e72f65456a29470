export { refresh, deletion, refreshActionOf, emptyChange, changeSize, serializeChange, sortChange } from "./change";
export { recordChange } from "./change_aggregator";
export type {
  Change,
  FileAction,
  MountKey,
  OverlayFiles,
  OverlaySource,
  RefreshAction,
  SerializedChange,
  SerializedFileAction,
} from "./change.types";
