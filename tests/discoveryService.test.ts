import fs from "fs";
import path from "path";
import { DiscoveryService, INetworkBringUp } from "../src/application/services/DiscoveryService.js";
import { DiscoveryError } from "../src/core/errors.js";
import type { BlockDevice, NetInterface } from "../src/core/entities/Hardware.js";
import type { CommandResult, ICommandRunner, IDeviceEnumerator } from "../src/core/interfaces/ISystemProbe.js";
import type { DiscoveryPayload, IDiscoveryReporter } from "../src/infrastructure/http/DiscoveryReporter.js";
import { BootstrapNetwork, NetworkBringUp } from "../src/infrastructure/system/NetworkBringUp.js";
import { SysfsDeviceEnumerator } from "../src/infrastructure/system/SysfsDeviceEnumerator.js";
import { GIB } from "../src/core/discovery/diskSelection.js";
import { tempDir } from "./fixtures.js";

const BOOTSTRAP: BootstrapNetwork = { address: "10.0.4.254/24", gateway: "10.0.4.1", dns: "10.0.4.1" };

class FakeEnumerator implements IDeviceEnumerator {
  constructor(
    private disks: BlockDevice[],
    private interfaces: NetInterface[]
  ) {}

  async listBlockDevices(): Promise<BlockDevice[]> {
    return this.disks;
  }

  async listNetInterfaces(): Promise<NetInterface[]> {
    return this.interfaces;
  }
}

class RecordingNetwork implements INetworkBringUp {
  calls: Array<{ nic: string; network: BootstrapNetwork }> = [];

  async bringUp(nic: string, network: BootstrapNetwork): Promise<void> {
    this.calls.push({ nic, network });
  }
}

class RecordingReporter implements IDiscoveryReporter {
  payloads: DiscoveryPayload[] = [];

  async report(payload: DiscoveryPayload): Promise<void> {
    this.payloads.push(payload);
  }
}

/** Answers with canned results keyed by "command arg0 arg1 ..." */
class FakeRunner implements ICommandRunner {
  calls: string[] = [];

  constructor(private results: Record<string, CommandResult> = {}) {}

  async run(command: string, args: string[]): Promise<CommandResult> {
    const line = [command, ...args].join(" ");
    this.calls.push(line);
    return this.results[line] ?? { exitCode: 0, stdout: "", stderr: "" };
  }
}

const ONBOARD_NIC: NetInterface = {
  name: "eno1",
  sysPath: "/sys/devices/pci0000:00/0000:00:1f.6/net/eno1",
  devicePath: "/sys/devices/pci0000:00/0000:00:1f.6",
  hasPhysicalSlot: false,
  onboardTag: true,
  mac: "aa:bb:cc:dd:ee:ff",
};

const SSD: BlockDevice = { name: "nvme0n1", sizeBytes: 256 * GIB, rotational: false, removable: false };

describe("DiscoveryService", () => {
  let dir: string;
  let answerFile: string;
  let network: RecordingNetwork;
  let reporter: RecordingReporter;

  beforeEach(() => {
    dir = tempDir();
    answerFile = path.join(dir, "answer.toml");
    network = new RecordingNetwork();
    reporter = new RecordingReporter();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function service(
    strategy: "report" | "patch",
    disks: BlockDevice[] = [SSD],
    interfaces: NetInterface[] = [ONBOARD_NIC]
  ): DiscoveryService {
    return new DiscoveryService(new FakeEnumerator(disks, interfaces), network, reporter, {
      strategy,
      answerFilePath: answerFile,
      bootstrap: BOOTSTRAP,
    });
  }

  test("should report the chosen hardware after bringing the NIC up", async () => {
    const outcome = await service("report").run();

    expect(outcome).toEqual({
      hardware: { diskPath: "/dev/nvme0n1", nicName: "eno1", nicMac: "aa:bb:cc:dd:ee:ff" },
      strategy: "report",
    });
    expect(network.calls).toEqual([{ nic: "eno1", network: BOOTSTRAP }]);
    expect(reporter.payloads).toEqual([{ disk: "/dev/nvme0n1", mgmt_nic: "eno1" }]);
  });

  test("should patch the answer file and keep a backup", async () => {
    const original = 'filter.ID_NET_NAME_MAC = "*00:11:22:33:44:55"\ndisk-list = ["/dev/sda"]\n';
    fs.writeFileSync(answerFile, original);

    const outcome = await service("patch").run();

    expect(outcome.patched).toBe(true);
    expect(fs.readFileSync(`${answerFile}.bak`, "utf8")).toBe(original);
    expect(fs.readFileSync(answerFile, "utf8")).toBe(
      'filter.ID_NET_NAME_MAC = "*aabbccddeeff"\ndisk-list = ["/dev/nvme0n1"]\n'
    );
    expect(network.calls).toEqual([]);
    expect(reporter.payloads).toEqual([]);
  });

  test("should succeed without patching when there is no answer file", async () => {
    const outcome = await service("patch").run();
    expect(outcome.patched).toBe(false);
    expect(fs.existsSync(`${answerFile}.bak`)).toBe(false);
  });

  test("should fail when no disk qualifies", async () => {
    const run = service("report", [{ ...SSD, sizeBytes: 8 * GIB }]).run();
    await expect(run).rejects.toThrow(DiscoveryError);
    await expect(service("report", []).run()).rejects.toMatchObject({ code: "disk-not-found" });
    expect(reporter.payloads).toEqual([]);
  });

  test("should fail when no NIC looks onboard", async () => {
    const slotted: NetInterface = { ...ONBOARD_NIC, onboardTag: false, hasPhysicalSlot: true };
    await expect(service("report", [SSD], [slotted]).run()).rejects.toMatchObject({
      code: "nic-not-found",
      message: "No onboard network interface found",
    });
  });

  test("should fail a patch run when the NIC has no MAC address", async () => {
    const noMac: NetInterface = { ...ONBOARD_NIC, mac: undefined };
    await expect(service("patch", [SSD], [noMac]).run()).rejects.toMatchObject({
      code: "mac-not-found",
      message: "No MAC address for interface eno1",
    });
  });

  test("should report a NIC without a MAC address", async () => {
    const noMac: NetInterface = { ...ONBOARD_NIC, mac: undefined };
    const outcome = await service("report", [SSD], [noMac]).run();

    expect(outcome.hardware).toEqual({ diskPath: "/dev/nvme0n1", nicName: "eno1", nicMac: null });
    expect(reporter.payloads).toEqual([{ disk: "/dev/nvme0n1", mgmt_nic: "eno1" }]);
  });
});

describe("NetworkBringUp", () => {
  let dir: string;

  beforeEach(() => {
    dir = tempDir();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test("should configure link, address, route and resolver", async () => {
    const runner = new FakeRunner();
    const resolvConf = path.join(dir, "resolv.conf");

    await new NetworkBringUp(runner, resolvConf).bringUp("eno1", BOOTSTRAP);

    expect(runner.calls).toEqual([
      "ip link set dev eno1 up",
      "ip addr add 10.0.4.254/24 dev eno1",
      "ip route add default via 10.0.4.1",
    ]);
    expect(fs.readFileSync(resolvConf, "utf8")).toBe("nameserver 10.0.4.1\n");
  });

  test("should tolerate settings that already exist", async () => {
    const runner = new FakeRunner({
      "ip addr add 10.0.4.254/24 dev eno1": { exitCode: 2, stdout: "", stderr: "RTNETLINK answers: File exists\n" },
    });
    await expect(
      new NetworkBringUp(runner, path.join(dir, "resolv.conf")).bringUp("eno1", BOOTSTRAP)
    ).resolves.toBeUndefined();
  });

  test("should fail on other command errors", async () => {
    const runner = new FakeRunner({
      "ip link set dev eno1 up": { exitCode: 1, stdout: "", stderr: "Cannot find device \"eno1\"\n" },
    });
    await expect(
      new NetworkBringUp(runner, path.join(dir, "resolv.conf")).bringUp("eno1", BOOTSTRAP)
    ).rejects.toMatchObject({
      code: "network-bring-up-failed",
      message: 'ip link set dev eno1 up failed (exit 1): Cannot find device "eno1"',
    });
    expect(runner.calls).toHaveLength(1);
  });
});

describe("SysfsDeviceEnumerator", () => {
  let sysRoot: string;

  function write(relative: string, contents: string): void {
    const file = path.join(sysRoot, relative);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, contents);
  }

  beforeEach(() => {
    sysRoot = tempDir("sysfs-");

    // 500118192 sectors of 512 bytes
    write("block/sda/size", "500118192\n");
    write("block/sda/removable", "0\n");
    write("block/sda/queue/rotational", "1\n");
    write("block/loop0/size", "0\n");

    const pciDevice = path.join(sysRoot, "devices/pci0000:00/0000:00:1f.6");
    write("devices/pci0000:00/0000:00:1f.6/net/eno1/address", "aa:bb:cc:dd:ee:ff\n");
    fs.symlinkSync(pciDevice, path.join(pciDevice, "net/eno1/device"));
    write("devices/virtual/net/lo/address", "00:00:00:00:00:00\n");

    fs.mkdirSync(path.join(sysRoot, "class/net"), { recursive: true });
    fs.symlinkSync(path.join(pciDevice, "net/eno1"), path.join(sysRoot, "class/net/eno1"));
    fs.symlinkSync(path.join(sysRoot, "devices/virtual/net/lo"), path.join(sysRoot, "class/net/lo"));
  });

  afterEach(() => {
    fs.rmSync(sysRoot, { recursive: true, force: true });
  });

  test("should read block devices in name order", async () => {
    const devices = await new SysfsDeviceEnumerator(new FakeRunner(), sysRoot).listBlockDevices();

    expect(devices).toEqual([
      { name: "loop0", sizeBytes: 0, rotational: false, removable: false },
      { name: "sda", sizeBytes: 500118192 * 512, rotational: true, removable: false },
    ]);
  });

  test("should resolve interfaces and ask udev for the onboard tag", async () => {
    const pciDevice = path.join(sysRoot, "devices/pci0000:00/0000:00:1f.6");
    const runner = new FakeRunner({
      [`udevadm info -q property -p ${pciDevice}/net/eno1`]: {
        exitCode: 0,
        stdout: "ID_NET_NAME_MAC=enxaabbccddeeff\nID_NET_NAME_ONBOARD=eno1\n",
        stderr: "",
      },
    });

    const interfaces = await new SysfsDeviceEnumerator(runner, sysRoot).listNetInterfaces();

    expect(interfaces).toEqual([
      {
        name: "eno1",
        sysPath: `${pciDevice}/net/eno1`,
        devicePath: pciDevice,
        hasPhysicalSlot: false,
        onboardTag: true,
        mac: "aa:bb:cc:dd:ee:ff",
      },
      {
        name: "lo",
        sysPath: path.join(sysRoot, "devices/virtual/net/lo"),
        devicePath: undefined,
        hasPhysicalSlot: false,
        onboardTag: false,
        mac: "00:00:00:00:00:00",
      },
    ]);
  });
});
