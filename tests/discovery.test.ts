import { GIB, eligibleDisks, selectInstallDisk } from "../src/core/discovery/diskSelection.js";
import { isPhysicalInterface, looksOnboard, selectManagementNic } from "../src/core/discovery/nicSelection.js";
import { isMacAddress, macFilterGlob, patchAnswerFile } from "../src/core/discovery/answerPatch.js";
import { renderAnswerFile } from "../src/core/templates/index.js";
import type { BlockDevice, NetInterface } from "../src/core/entities/Hardware.js";
import { dhcpConfig } from "./fixtures.js";

function disk(name: string, sizeGiB: number, rotational: boolean, removable: boolean = false): BlockDevice {
  return { name, sizeBytes: sizeGiB * GIB, rotational, removable };
}

function nic(name: string, fields: Partial<NetInterface> = {}): NetInterface {
  return {
    name,
    sysPath: `/sys/devices/pci0000:00/0000:00:1f.6/net/${name}`,
    devicePath: "/sys/devices/pci0000:00/0000:00:1f.6",
    hasPhysicalSlot: false,
    onboardTag: false,
    mac: "aa:bb:cc:dd:ee:01",
    ...fields,
  };
}

describe("Install disk selection", () => {
  test("should prefer solid-state disks", () => {
    const devices = [disk("sda", 500, true), disk("nvme0n1", 1000, false)];
    expect(selectInstallDisk(devices)).toBe("/dev/nvme0n1");
  });

  test("should pick the smallest disk within a tier", () => {
    const devices = [disk("sda", 2000, true), disk("sdb", 120, true), disk("sdc", 500, true)];
    expect(selectInstallDisk(devices)).toBe("/dev/sdb");
  });

  test("should keep enumeration order on equal sizes", () => {
    const devices = [disk("sdb", 240, false), disk("sda", 240, false)];
    expect(selectInstallDisk(devices)).toBe("/dev/sdb");
  });

  test("should treat disks of the same whole GiB as equal", () => {
    const devices = [
      { name: "sda", sizeBytes: 500 * GIB + 4096, rotational: true, removable: false },
      { name: "sdb", sizeBytes: 500 * GIB, rotational: true, removable: false },
    ];
    expect(selectInstallDisk(devices)).toBe("/dev/sda");
  });

  test("should skip small, removable and virtual devices", () => {
    const devices = [
      disk("loop0", 100, false),
      disk("ram0", 64, false),
      disk("sr0", 100, true),
      disk("sdz", 64, false, true),
      disk("sda", 19, false),
      disk("sdb", 20, true),
    ];
    expect(eligibleDisks(devices).map((d) => d.name)).toEqual(["sdb"]);
    expect(selectInstallDisk(devices)).toBe("/dev/sdb");
  });

  test("should return null when nothing qualifies", () => {
    expect(selectInstallDisk([disk("sda", 8, false)])).toBeNull();
    expect(selectInstallDisk([])).toBeNull();
  });
});

describe("Management NIC selection", () => {
  test("should prefer interfaces udev names as onboard", () => {
    const interfaces = [
      nic("enp1s0", { devicePath: "/sys/devices/pci0000:00/0000:00:1c.0/0000:01:00.0" }),
      nic("eno1", {
        onboardTag: true,
        devicePath: "/sys/devices/pci0000:00/0000:00:1c.4/0000:03:00.0",
      }),
    ];
    expect(selectManagementNic(interfaces)?.name).toBe("eno1");
  });

  test("should fall back to functions on the root bus without a slot", () => {
    const interfaces = [
      nic("enp1s0", { devicePath: "/sys/devices/pci0000:00/0000:00:1c.0/0000:01:00.0", hasPhysicalSlot: true }),
      nic("enp0s31f6"),
    ];
    expect(selectManagementNic(interfaces)?.name).toBe("enp0s31f6");
  });

  test("should count slotless functions behind a root port as onboard", () => {
    const bridged = nic("enp2s0", { devicePath: "/sys/devices/pci0000:00/0000:00:1c.4/0000:02:00.0" });
    expect(looksOnboard(bridged)).toBe(true);
    expect(looksOnboard(nic("enp65s0", { devicePath: "/sys/devices/pci0000:40/0000:40:01.1/0000:41:00.0" }))).toBe(
      false
    );
  });

  test("should ignore slotted cards and virtual interfaces", () => {
    expect(looksOnboard(nic("enp0s3", { hasPhysicalSlot: true }))).toBe(false);
    expect(looksOnboard(nic("br0", { devicePath: undefined }))).toBe(false);
    expect(isPhysicalInterface(nic("lo"))).toBe(false);
    expect(isPhysicalInterface(nic("veth0", { sysPath: "/sys/devices/virtual/net/veth0" }))).toBe(false);
  });

  test("should return null when nothing looks onboard", () => {
    const interfaces = [
      nic("lo", { sysPath: "/sys/devices/virtual/net/lo", devicePath: undefined }),
      nic("enp1s0", { devicePath: "/sys/devices/pci0000:00/0000:00:1c.0/0000:01:00.0", hasPhysicalSlot: true }),
      nic("enp65s0", { devicePath: "/sys/devices/pci0000:40/0000:40:01.1/0000:41:00.0" }),
    ];
    expect(selectManagementNic(interfaces)).toBeNull();
  });
});

describe("Answer file patching", () => {
  const answer = [
    "[network]",
    'source = "from-answer"',
    'filter.ID_NET_NAME_MAC = "*00:11:22:33:44:55"',
    "",
    "[disk-setup]",
    'filesystem = "zfs"',
    'disk-list = ["/dev/sda", "/dev/sdb"]',
    "",
  ].join("\n");

  test("should rewrite the NIC filter and the disk list", () => {
    const result = patchAnswerFile(answer, { mac: "aa:bb:cc:dd:ee:ff", disk: "/dev/nvme0n1" });

    expect(result.macPatched).toBe(true);
    expect(result.diskPatched).toBe(true);
    expect(result.contents).toBe(
      [
        "[network]",
        'source = "from-answer"',
        'filter.ID_NET_NAME_MAC = "*aabbccddeeff"',
        "",
        "[disk-setup]",
        'filesystem = "zfs"',
        'disk-list = ["/dev/nvme0n1"]',
        "",
      ].join("\n")
    );
  });

  test("should leave files without those lines untouched", () => {
    const dhcp = '[network]\nsource = "from-dhcp"\n';
    expect(patchAnswerFile(dhcp, { mac: "aa:bb:cc:dd:ee:ff", disk: "/dev/sda" })).toEqual({
      contents: dhcp,
      macPatched: false,
      diskPatched: false,
    });
  });

  test("should only touch what it is given", () => {
    const result = patchAnswerFile(answer, { mac: "aa:bb:cc:dd:ee:ff" });
    expect(result.diskPatched).toBe(false);
    expect(result.contents).toContain('disk-list = ["/dev/sda", "/dev/sdb"]');
  });

  test("should write the MAC the way udev names the interface", () => {
    expect(macFilterGlob("AA:BB:CC:DD:EE:FF")).toBe("*aabbccddeeff");
    expect(patchAnswerFile(answer, { mac: "AA:BB:CC:DD:EE:FF" }).contents).toContain(
      'filter.ID_NET_NAME_MAC = "*aabbccddeeff"\n'
    );
  });

  test("should pin the NIC of a rendered dhcp answer file", () => {
    const result = patchAnswerFile(renderAnswerFile(dhcpConfig()), { mac: "aa:bb:cc:dd:ee:ff" });

    expect(result.macPatched).toBe(true);
    expect(result.contents).toContain('[network]\nsource = "from-dhcp"\nfilter.ID_NET_NAME_MAC = "*aabbccddeeff"\n');
  });

  test("should recognize MAC addresses", () => {
    expect(isMacAddress("AA:bb:cc:dd:ee:ff")).toBe(true);
    expect(isMacAddress("aa-bb-cc-dd-ee-ff")).toBe(false);
    expect(isMacAddress("aa:bb:cc:dd:ee")).toBe(false);
  });
});
