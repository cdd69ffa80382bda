import { describe, expect, test } from "vitest";
import { createPermissionCapability, noopPermissions } from "../../src/core/archive/permissions";

describe("createPermissionCapability", () => {
  test("uses ACL tools on POSIX platforms and Windows", () => {
    expect(createPermissionCapability("linux").supported).toBe(true);
    expect(createPermissionCapability("darwin").supported).toBe(true);
    expect(createPermissionCapability("win32").supported).toBe(true);
  });

  test("falls back to a no-op elsewhere", async () => {
    const capability = createPermissionCapability("aix");

    expect(capability).toBe(noopPermissions);
    expect(await capability.getPermissionDescriptor("/srv/data")).toBeNull();
  });
});
