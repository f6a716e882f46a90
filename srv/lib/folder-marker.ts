/**
 * Name of the hidden zero-byte object that makes an otherwise empty folder exist.
 * A flat store has no directories: a folder is only visible while some key sits under it.
 */
export const FOLDER_MARKER = "$$$folder$$$.$$$";

/** Marker key for a folder prefix (which is either "" or ends with "/"). */
export function markerKey(folderPrefix: string): string {
  return `${folderPrefix}${FOLDER_MARKER}`;
}

export function isFolderMarker(key: string): boolean {
  return key === FOLDER_MARKER || key.endsWith(`/${FOLDER_MARKER}`);
}
