import type { DeviceListing } from "../../core/device/device.types";
import { parseDeviceList } from "../../core/device/parseDeviceList";
import { type DeviceInventory, InventoryUnavailableError } from "../../ports/DeviceInventory";
import { retry } from "../../shared/retry/retry";
import { CommandError, runCommand, type RunCommand } from "../process/runCommand";

export type SimctlOptions = {
  xcrunPath?: string;
  deviceSetPath?: string;
  timeoutMs?: number;
  retries?: number;
  retryMinDelayMs?: number;
  retryMaxDelayMs?: number;
  signal?: AbortSignal;
  run?: RunCommand;
};

const MAX_LIST_OUTPUT_BYTES = 32 * 1024 * 1024;

/**
 * DeviceInventory backed by `xcrun simctl`.
 * Timed-out prune and list calls are retried. A timed-out delete is not: the
 * device may already be gone, and a second attempt would report it missing.
 */
export class SimctlDeviceInventory implements DeviceInventory {
  private readonly xcrunPath: string;
  private readonly run: RunCommand;

  constructor(private readonly opts: SimctlOptions = {}) {
    this.xcrunPath = opts.xcrunPath ?? "xcrun";
    this.run = opts.run ?? runCommand;
  }

  async pruneUnavailable(): Promise<void> {
    await this.simctl(["delete", "unavailable"], { retryTimeouts: true });
  }

  async listDevices(): Promise<DeviceListing> {
    const stdout = await this.simctl(["list", "devices", "--json"], {
      retryTimeouts: true,
      maxOutputBytes: MAX_LIST_OUTPUT_BYTES
    });
    return parseDeviceList(stdout);
  }

  async deleteDevice(identifier: string): Promise<void> {
    await this.simctl(["delete", identifier], { retryTimeouts: false });
  }

  private async simctl(
    subcommand: string[],
    { retryTimeouts, maxOutputBytes }: { retryTimeouts: boolean; maxOutputBytes?: number }
  ): Promise<string> {
    const setArgs = this.opts.deviceSetPath ? ["--set", this.opts.deviceSetPath] : [];
    const args = ["simctl", ...setArgs, ...subcommand];
    const label = `simctl ${subcommand[0] ?? ""}`.trim();

    try {
      return await retry(
        () => this.run(this.xcrunPath, args, {
          timeoutMs: this.opts.timeoutMs ?? 60000,
          maxOutputBytes,
          signal: this.opts.signal
        }),
        {
          retries: retryTimeouts ? this.opts.retries ?? 2 : 0,
          minDelayMs: this.opts.retryMinDelayMs ?? 500,
          maxDelayMs: this.opts.retryMaxDelayMs ?? 4000,
          signal: this.opts.signal,
          shouldRetry: (err) => err instanceof CommandError && err.kind === "timeout",
          onRetry: ({ attempt, maxAttempts, delayMs }) => {
            // eslint-disable-next-line no-console
            console.warn(JSON.stringify({ event: "simctl.retry", command: label, attempt, maxAttempts, delayMs }));
          },
          onGiveUp: ({ attempt, maxAttempts, error }) => {
            // eslint-disable-next-line no-console
            console.warn(JSON.stringify({
              event: "simctl.give_up",
              command: label,
              kind: error instanceof CommandError ? error.kind : null,
              attempt,
              maxAttempts
            }));
          }
        }
      );
    } catch (err) {
      if (err instanceof CommandError && err.kind === "not_found") {
        throw new InventoryUnavailableError(`${this.xcrunPath} is not available: ${err.message}`, err);
      }
      throw err;
    }
  }
}
