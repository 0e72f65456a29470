export { ChokidarFileWatcher } from "./chokidar_file_watcher";
