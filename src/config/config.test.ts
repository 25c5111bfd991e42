import { describe, expect, test } from "vitest";
import { createMockFileSystem, createMockLogger } from "#/test-utils/mocks";
import {
  createXkbContext,
  isWaylandSession,
  resolveXkbPaths,
  rulesPath,
  symbolsPath,
} from "./config";

describe("config", () => {
  describe("resolveXkbPaths", () => {
    test("uses /usr/share/X11/xkb for the system tree by default", () => {
      expect(resolveXkbPaths({ system: true, env: {} })).toEqual({
        root: "/usr/share/X11/xkb",
        system: true,
      });
    });

    test("honors XKB_CONFIG_ROOT for the system tree", () => {
      const paths = resolveXkbPaths({ system: true, env: { XKB_CONFIG_ROOT: "/opt/xkb" } });

      expect(paths.root).toBe("/opt/xkb");
    });

    test("uses XDG_CONFIG_HOME for the user tree", () => {
      const paths = resolveXkbPaths({ env: { XDG_CONFIG_HOME: "/tmp/config" } });

      expect(paths).toEqual({ root: "/tmp/config/xkb", system: false });
    });

    test("falls back to ~/.config when XDG_CONFIG_HOME is unset or empty", () => {
      expect(resolveXkbPaths({ env: {}, homeDir: "/home/test" }).root).toBe(
        "/home/test/.config/xkb"
      );
      expect(resolveXkbPaths({ env: { XDG_CONFIG_HOME: "" }, homeDir: "/home/test" }).root).toBe(
        "/home/test/.config/xkb"
      );
    });
  });

  describe("isWaylandSession", () => {
    test("detects wayland session types", () => {
      expect(isWaylandSession({ XDG_SESSION_TYPE: "wayland" })).toBe(true);
      expect(isWaylandSession({ XDG_SESSION_TYPE: "x11" })).toBe(false);
      expect(isWaylandSession({})).toBe(false);
    });
  });

  describe("rulesPath / symbolsPath", () => {
    test("point inside the root directory", () => {
      const paths = { root: "/xkb", system: false };

      expect(rulesPath(paths, "evdev.xml")).toBe("/xkb/rules/evdev.xml");
      expect(symbolsPath(paths, "fr")).toBe("/xkb/symbols/fr");
    });
  });

  describe("createXkbContext", () => {
    test("uses the injected file system and logger", () => {
      const fs = createMockFileSystem();
      const logger = createMockLogger();

      const ctx = createXkbContext({ fs, logger, env: { XDG_CONFIG_HOME: "/cfg" } });

      expect(ctx.fs).toBe(fs);
      expect(ctx.logger).toBe(logger);
      expect(ctx.paths).toEqual({ root: "/cfg/xkb", system: false });
    });
  });
});
