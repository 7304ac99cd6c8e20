export type DeviceRecord = {
  identifier: string;   // simctl udid
  dataPath: string;     // mtime doubles as "last activity" when no lease exists
  logPath?: string;
  runtime: string;      // grouping key only, never used by policy
  name?: string;
  state?: string;
  isAvailable?: boolean;
};

export type DeviceListing = Record<string, DeviceRecord[]>;
