export interface DeviceFileSystem {
  modifiedAt(path: string): Promise<Date>;
  /** Recursive delete; a missing path is a no-op. */
  removeTree(path: string): Promise<void>;
}
