import {
  passwordEntropy,
  validateEmail,
  validateFqdn,
  validateNetwork,
  validatePassword,
} from "../src/core/validation/validators.js";
import { formatIPv4, inSameNetwork, networkMask, parseCidr, parseIPv4 } from "../src/core/validation/ipv4.js";

describe("IPv4 helpers", () => {
  test("should parse and format dotted quads", () => {
    expect(parseIPv4("192.168.1.10")).toBe(0xc0a8010a);
    expect(formatIPv4(0xc0a8010a)).toBe("192.168.1.10");
  });

  test("should reject malformed addresses", () => {
    expect(parseIPv4("256.1.1.1")).toBeNull();
    expect(parseIPv4("10.0.0")).toBeNull();
    expect(parseIPv4("10.0.0.01")).toBeNull();
    expect(parseIPv4("a.b.c.d")).toBeNull();
  });

  test("should default a bare address to /24", () => {
    expect(parseCidr("10.0.0.5")).toEqual({ address: 0x0a000005, prefixLength: 24, text: "10.0.0.5/24" });
  });

  test("should report invalid prefixes", () => {
    expect(parseCidr("10.0.0.5/33")).toBe("Prefix length must be between 0 and 32: 33");
    expect(parseCidr("10.0.0.5/x")).toBe("Invalid prefix length: x");
    expect(parseCidr("10.0.0/24")).toBe("Invalid IPv4 address in CIDR: 10.0.0");
  });

  test("should compute masks at the edges", () => {
    expect(networkMask(0)).toBe(0);
    expect(networkMask(24)).toBe(0xffffff00);
    expect(networkMask(32)).toBe(0xffffffff);
  });

  test("should compare networks under a mask", () => {
    const network = 0x0a000005;
    expect(inSameNetwork(network, 0x0a0000fe, 24)).toBe(true);
    expect(inSameNetwork(network, 0x0a0001fe, 24)).toBe(false);
    expect(inSameNetwork(network, 0xc0a80001, 0)).toBe(true);
  });
});

describe("validateFqdn", () => {
  test("should accept a host with a domain", () => {
    expect(validateFqdn("pve1.example.com")).toEqual({ valid: true });
  });

  test("should reject empty input", () => {
    expect(validateFqdn("  ")).toEqual({ valid: false, message: "FQDN cannot be empty" });
  });

  test("should require at least two labels", () => {
    expect(validateFqdn("pve1")).toEqual({ valid: false, message: "FQDN must contain a host name and a domain" });
  });

  test("should reject labels with leading hyphens", () => {
    expect(validateFqdn("-pve.example.com")).toEqual({ valid: false, message: "Invalid FQDN label: -pve" });
  });

  test("should reject numeric top-level domains", () => {
    expect(validateFqdn("pve.example.123")).toEqual({ valid: false, message: "Invalid top-level domain: 123" });
  });

  test("should reject empty labels", () => {
    expect(validateFqdn("pve..com")).toEqual({ valid: false, message: "FQDN contains an empty label" });
  });
});

describe("validatePassword", () => {
  test("should refuse anything shorter than 12 characters", () => {
    expect(validatePassword("Ab1!")).toEqual({
      valid: false,
      entropy: 0,
      message: "Password must be at least 12 characters long.",
    });
  });

  test("should refuse 12 characters from every class", () => {
    // 12 * log2(82) is about 76.3 bits
    const check = validatePassword("Abcdefgh1!xy");
    expect(check.valid).toBe(false);
    expect(check.message).toBe("Low entropy password detected!");
    expect(check.entropy).toBeCloseTo(76.29, 1);
  });

  test("should accept 13 characters from every class", () => {
    const check = validatePassword("Abcdefgh1!xyz");
    expect(check.valid).toBe(true);
    expect(check.message).toBeUndefined();
  });

  test("should need 18 lowercase letters", () => {
    expect(validatePassword("abcdefghijklmnopq").valid).toBe(false);
    expect(validatePassword("abcdefghijklmnopqr").valid).toBe(true);
  });

  test("should give no credit for characters outside the known classes", () => {
    expect(passwordEntropy("------------")).toBe(0);
  });
});

describe("validateEmail", () => {
  test("should accept ordinary addresses", () => {
    expect(validateEmail("ops+pve@example.org")).toEqual({ valid: true });
  });

  test("should accept local mailboxes", () => {
    expect(validateEmail("root@localhost")).toEqual({ valid: true });
  });

  test("should reject empty input", () => {
    expect(validateEmail("")).toEqual({ valid: false, message: "Email cannot be empty" });
  });

  test("should reject addresses without a domain", () => {
    expect(validateEmail("admin@")).toEqual({ valid: false, message: "Please enter a valid email address!" });
  });
});

describe("validateNetwork", () => {
  test("should clear static fields for dhcp", () => {
    const result = validateNetwork({ source: "dhcp", cidr: "10.0.0.5/24", gateway: "10.0.0.1" });
    expect(result).toEqual({
      valid: true,
      value: { source: "dhcp", cidr: null, gateway: null, dns: null, macFilter: "*00:11:22:33:44:55" },
    });
  });

  test("should normalize a static configuration", () => {
    const result = validateNetwork({
      source: "static",
      cidr: "10.0.0.5",
      gateway: "10.0.0.1",
      dns: "10.0.0.2, 10.0.0.3",
      macFilter: "aa:bb:cc:dd:ee:ff",
    });
    expect(result).toEqual({
      valid: true,
      value: {
        source: "static",
        cidr: "10.0.0.5/24",
        gateway: "10.0.0.1",
        dns: ["10.0.0.2", "10.0.0.3"],
        macFilter: "*aa:bb:cc:dd:ee:ff",
      },
    });
  });

  test("should fall back to the default MAC filter", () => {
    const result = validateNetwork({ source: "static", cidr: "10.0.0.5/24", gateway: "10.0.0.1", dns: ["10.0.0.1"] });
    expect(result.valid && result.value.source === "static" && result.value.macFilter).toBe("*00:11:22:33:44:55");
  });

  test("should report every missing static field", () => {
    const result = validateNetwork({ source: "static" });
    expect(result).toEqual({
      valid: false,
      errors: {
        cidr: "CIDR cannot be empty!",
        gateway: "Gateway cannot be empty!",
        dns: "DNS cannot be empty!",
      },
    });
  });

  test("should reject a gateway outside the network", () => {
    const result = validateNetwork({ source: "static", cidr: "10.0.0.5/24", gateway: "10.0.1.1", dns: "10.0.0.1" });
    expect(result).toEqual({
      valid: false,
      errors: { gateway: "Gateway 10.0.1.1 is not inside network 10.0.0.5/24" },
    });
  });

  test("should accept any gateway on a /0 network", () => {
    const result = validateNetwork({ source: "static", cidr: "10.0.0.5/0", gateway: "192.168.1.1", dns: "10.0.0.1" });
    expect(result.valid).toBe(true);
  });

  test("should reject invalid and duplicate DNS servers", () => {
    const invalid = validateNetwork({ source: "static", cidr: "10.0.0.5/24", gateway: "10.0.0.1", dns: "10.0.0.300" });
    expect(invalid).toEqual({ valid: false, errors: { dns: "Invalid DNS server IP address: 10.0.0.300" } });

    const duplicate = validateNetwork({
      source: "static",
      cidr: "10.0.0.5/24",
      gateway: "10.0.0.1",
      dns: ["10.0.0.1", "10.0.0.1"],
    });
    expect(duplicate).toEqual({ valid: false, errors: { dns: "Duplicate DNS server IP address: 10.0.0.1" } });
  });

  test("should reject a malformed gateway", () => {
    const result = validateNetwork({ source: "static", cidr: "10.0.0.5/24", gateway: "10.0.0", dns: "10.0.0.1" });
    expect(result).toEqual({ valid: false, errors: { gateway: "Invalid gateway IP address: 10.0.0" } });
  });

  test("should reject a malformed MAC filter", () => {
    const result = validateNetwork({
      source: "static",
      cidr: "10.0.0.5/24",
      gateway: "10.0.0.1",
      dns: "10.0.0.1",
      macFilter: "zz:zz",
    });
    expect(result).toEqual({ valid: false, errors: { macFilter: "Invalid MAC address filter: *zz:zz" } });
  });
});
