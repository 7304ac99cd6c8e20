describe("composition root", () => {
  afterEach(() => {
    jest.resetModules();
    jest.restoreAllMocks();
  });

  const summary = {
    examined: 0,
    reclaimed: 0,
    retained: 0,
    failed: 0,
    dryRun: false,
    reclaimedByReason: {},
    retainedByReason: {},
    failures: [],
    warnings: []
  };

  const mockCollaborators = () => {
    const inventory = { kind: "inventory" };
    const leases = { kind: "leases" };
    const files = { kind: "files" };
    const reclaimDevices = jest.fn().mockResolvedValue(summary);
    const simctlCtor = jest.fn().mockImplementation(() => inventory);
    const leaseCtor = jest.fn().mockImplementation(() => leases);
    const filesCtor = jest.fn().mockImplementation(() => files);

    jest.doMock("../../src/application/reclaim-devices/reclaimDevices.usecase", () => ({ reclaimDevices }));
    jest.doMock("../../src/infrastructure/simctl/SimctlDeviceInventory", () => ({ SimctlDeviceInventory: simctlCtor }));
    jest.doMock("../../src/infrastructure/fs/FileLeaseStore", () => ({ FileLeaseStore: leaseCtor }));
    jest.doMock("../../src/infrastructure/fs/NodeDeviceFileSystem", () => ({ NodeDeviceFileSystem: filesCtor }));

    return { inventory, leases, files, reclaimDevices, simctlCtor, leaseCtor, filesCtor };
  };

  it("wires the simctl inventory, lease store and filesystem with defaults", async () => {
    const mocks = mockCollaborators();

    const { runReclaim } = await import("../../src/composition/root");
    await expect(runReclaim({ HOME: "/Users/ci" })).resolves.toEqual(summary);

    expect(mocks.simctlCtor).toHaveBeenCalledWith({
      xcrunPath: "xcrun",
      deviceSetPath: undefined,
      timeoutMs: 60000,
      signal: expect.any(AbortSignal)
    });
    expect(mocks.leaseCtor).toHaveBeenCalledWith("/Users/ci/.simulator-leases");
    expect(mocks.filesCtor).toHaveBeenCalledTimes(1);
    expect(mocks.reclaimDevices).toHaveBeenCalledWith({
      inventory: mocks.inventory,
      leases: mocks.leases,
      files: mocks.files,
      config: {
        staleAfterMs: 3600000,
        concurrency: 1,
        dryRun: false,
        continueOnPruneFailure: false
      },
      now: expect.any(Date),
      signal: expect.any(AbortSignal)
    });
  });

  it("shares one deadline signal between the inventory and the run", async () => {
    const mocks = mockCollaborators();

    const { runReclaim } = await import("../../src/composition/root");
    await runReclaim({ HOME: "/Users/ci", RECLAIM_DEADLINE_MS: "60000" });

    const [{ signal: inventorySignal }] = mocks.simctlCtor.mock.calls[0] as [{ signal: AbortSignal }];
    const [{ signal: runSignal }] = mocks.reclaimDevices.mock.calls[0] as [{ signal: AbortSignal }];
    expect(inventorySignal).toBe(runSignal);
    expect(runSignal.aborted).toBe(false);
  });

  it("applies overrides from env", async () => {
    const mocks = mockCollaborators();

    const { runReclaim } = await import("../../src/composition/root");
    await runReclaim({
      HOME: "/Users/ci",
      RECLAIM_LEASE_DIR: "/var/ci/leases",
      XCRUN_PATH: "/usr/bin/xcrun",
      SIMCTL_DEVICE_SET: "/var/ci/device-set",
      SIMCTL_TIMEOUT_MS: "5000",
      RECLAIM_CONCURRENCY: "4",
      RECLAIM_STALE_AFTER_SECONDS: "7200",
      RECLAIM_DRY_RUN: "true"
    });

    expect(mocks.simctlCtor).toHaveBeenCalledWith({
      xcrunPath: "/usr/bin/xcrun",
      deviceSetPath: "/var/ci/device-set",
      timeoutMs: 5000,
      signal: expect.any(AbortSignal)
    });
    expect(mocks.leaseCtor).toHaveBeenCalledWith("/var/ci/leases");
    expect(mocks.reclaimDevices).toHaveBeenCalledWith(expect.objectContaining({
      config: {
        staleAfterMs: 7200000,
        concurrency: 4,
        dryRun: true,
        continueOnPruneFailure: false
      }
    }));
  });

  it("fails fast when runtime caps are violated", async () => {
    const mocks = mockCollaborators();

    const { runReclaim } = await import("../../src/composition/root");
    await expect(runReclaim({ HOME: "/Users/ci", RECLAIM_CONCURRENCY: "999" })).rejects.toThrow(
      "RECLAIM_CONCURRENCY=999 is out of allowed range [1..16]"
    );
    expect(mocks.simctlCtor).not.toHaveBeenCalled();
    expect(mocks.reclaimDevices).not.toHaveBeenCalled();
  });
});
