import { flattenDeviceListing, InvalidDeviceListError, parseDeviceList } from "../../src/core/device/parseDeviceList";

const IOS_17 = "com.apple.CoreSimulator.SimRuntime.iOS-17-0";
const WATCH_10 = "com.apple.CoreSimulator.SimRuntime.watchOS-10-0";

const sampleOutput = JSON.stringify({
  devices: {
    [IOS_17]: [
      {
        lastBootedAt: "2026-02-28T09:00:00Z",
        dataPath: "/Users/ci/Library/Developer/CoreSimulator/Devices/AAA/data",
        dataPathSize: 1024,
        logPath: "/Users/ci/Library/Logs/CoreSimulator/AAA",
        udid: "AAA",
        isAvailable: true,
        deviceTypeIdentifier: "com.apple.CoreSimulator.SimDeviceType.iPhone-15",
        state: "Shutdown",
        name: "iPhone 15"
      }
    ],
    [WATCH_10]: [
      {
        dataPath: "/Users/ci/Library/Developer/CoreSimulator/Devices/BBB/data",
        udid: "BBB",
        isAvailable: false,
        state: "Shutdown",
        name: "Apple Watch"
      }
    ]
  }
});

describe("parseDeviceList", () => {
  it("maps simctl devices into records grouped by runtime", () => {
    expect(parseDeviceList(sampleOutput)).toEqual({
      [IOS_17]: [
        {
          identifier: "AAA",
          dataPath: "/Users/ci/Library/Developer/CoreSimulator/Devices/AAA/data",
          logPath: "/Users/ci/Library/Logs/CoreSimulator/AAA",
          runtime: IOS_17,
          name: "iPhone 15",
          state: "Shutdown",
          isAvailable: true
        }
      ],
      [WATCH_10]: [
        {
          identifier: "BBB",
          dataPath: "/Users/ci/Library/Developer/CoreSimulator/Devices/BBB/data",
          logPath: undefined,
          runtime: WATCH_10,
          name: "Apple Watch",
          state: "Shutdown",
          isAvailable: false
        }
      ]
    });
  });

  it("accepts an empty inventory", () => {
    expect(parseDeviceList(JSON.stringify({ devices: {} }))).toEqual({});
  });

  it("flattens all runtimes into one list", () => {
    expect(flattenDeviceListing(parseDeviceList(sampleOutput)).map((d) => d.identifier)).toEqual(["AAA", "BBB"]);
  });

  it("rejects output that is not JSON", () => {
    expect(() => parseDeviceList("== Devices ==")).toThrow(
      new InvalidDeviceListError("Invalid device list: output is not JSON")
    );
  });

  it("rejects output without a devices map", () => {
    expect(() => parseDeviceList(JSON.stringify({ runtimes: [] }))).toThrow(InvalidDeviceListError);
  });

  it("rejects a device missing its data path and names the field", () => {
    const output = JSON.stringify({ devices: { [IOS_17]: [{ udid: "AAA", name: "iPhone 15" }] } });

    expect(() => parseDeviceList(output)).toThrow(`devices.${IOS_17}.0.dataPath`);
  });
});
