export { OverlayFs, compareKeys } from "./overlay_fs";
