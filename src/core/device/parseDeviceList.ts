import { z } from "zod";
import type { DeviceListing, DeviceRecord } from "./device.types";

export class InvalidDeviceListError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidDeviceListError";
  }
}

const simctlDeviceSchema = z.object({
  udid: z.string().trim().min(1),
  dataPath: z.string().min(1),
  logPath: z.string().min(1).optional(),
  name: z.string().optional(),
  state: z.string().optional(),
  isAvailable: z.boolean().optional()
});

const simctlListSchema = z.object({
  devices: z.record(z.string(), z.array(simctlDeviceSchema))
});

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");

/**
 * Parses `simctl list devices --json` output into devices grouped by runtime.
 * Unknown fields are ignored. A single malformed device rejects the whole listing.
 */
export const parseDeviceList = (stdout: string): DeviceListing => {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    throw new InvalidDeviceListError("Invalid device list: output is not JSON");
  }

  const parsed = simctlListSchema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidDeviceListError(`Invalid device list: ${formatIssues(parsed.error)}`);
  }

  const listing: DeviceListing = {};
  for (const [runtime, devices] of Object.entries(parsed.data.devices)) {
    listing[runtime] = devices.map((device): DeviceRecord => ({
      identifier: device.udid,
      dataPath: device.dataPath,
      logPath: device.logPath,
      runtime,
      name: device.name,
      state: device.state,
      isAvailable: device.isAvailable
    }));
  }
  return listing;
};

export const flattenDeviceListing = (listing: DeviceListing): DeviceRecord[] =>
  Object.values(listing).flat();
