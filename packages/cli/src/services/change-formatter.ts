import type { SerializedChange, SerializedFileAction } from '@unionmount/core';

function describeAction(action: SerializedFileAction): string {
  if (action.type === 'delete') {
    return 'deleted';
  }
  const sources = action.files.map(({ source }) => String(source)).join(', ');
  return `${action.action} from ${sources}`;
}

/** One line per path: `[tag] path: action from sources`. */
export function formatChange(change: SerializedChange): string[] {
  const lines: string[] = [];
  for (const [tag, files] of Object.entries(change)) {
    for (const [filePath, action] of Object.entries(files)) {
      lines.push(`[${tag}] ${filePath}: ${describeAction(action)}`);
    }
  }
  return lines;
}

/** Paths provided by more than one source. */
export function overlaidPaths(change: SerializedChange): string[] {
  const paths: string[] = [];
  for (const files of Object.values(change)) {
    for (const [filePath, action] of Object.entries(files)) {
      if (action.type === 'refresh' && action.files.length > 1) {
        paths.push(filePath);
      }
    }
  }
  return paths;
}
