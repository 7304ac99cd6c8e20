import fs from "fs/promises";
import type { DeviceFileSystem } from "../../ports/DeviceFileSystem";

export class NodeDeviceFileSystem implements DeviceFileSystem {
  async modifiedAt(targetPath: string): Promise<Date> {
    const stats = await fs.stat(targetPath);
    return stats.mtime;
  }

  async removeTree(targetPath: string): Promise<void> {
    await fs.rm(targetPath, { recursive: true, force: true });
  }
}
