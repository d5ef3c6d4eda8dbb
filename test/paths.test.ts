import { describe, it, expect } from "vitest";
import * as path from "node:path";
import * as os from "node:os";
import { APP_NAME, HOME_ENV_VAR, resolveAppPaths } from "../src/core/utils/paths.js";

describe("App paths module", () => {
  describe("resolveAppPaths (platform directories)", () => {
    it("returns absolute paths", () => {
      const paths = resolveAppPaths({});

      expect(path.isAbsolute(paths.dataDir)).toBe(true);
      expect(path.isAbsolute(paths.runsDir)).toBe(true);
      expect(path.isAbsolute(paths.configFile)).toBe(true);
    });

    it("returns runsDir as direct child of dataDir", () => {
      const paths = resolveAppPaths({});

      expect(path.relative(paths.dataDir, paths.runsDir)).toBe("runs");
    });

    it("names the config file config.yaml", () => {
      const paths = resolveAppPaths({});

      expect(path.basename(paths.configFile)).toBe("config.yaml");
    });

    it("uses tapforge as the application name", () => {
      const paths = resolveAppPaths({});

      expect(APP_NAME).toBe("tapforge");
      expect(paths.dataDir.toLowerCase()).toContain("tapforge");
    });

    it("does NOT use a hardcoded dot directory in home", () => {
      const paths = resolveAppPaths({});

      expect(paths.dataDir).not.toBe(path.join(os.homedir(), ".tapforge"));
    });

    it("returns frozen (immutable) object", () => {
      expect(Object.isFrozen(resolveAppPaths({}))).toBe(true);
    });
  });

  describe("resolveAppPaths (home override)", () => {
    it("places everything under the override directory", () => {
      const home = path.join(os.tmpdir(), "tapforge-home");

      const paths = resolveAppPaths({ [HOME_ENV_VAR]: home });

      expect(paths.dataDir).toBe(home);
      expect(paths.runsDir).toBe(path.join(home, "runs"));
      expect(paths.configFile).toBe(path.join(home, "config.yaml"));
    });

    it("resolves a relative override against the working directory", () => {
      const paths = resolveAppPaths({ [HOME_ENV_VAR]: "relative-home" });

      expect(paths.dataDir).toBe(path.resolve("relative-home"));
    });

    it("ignores a blank override", () => {
      const blank = resolveAppPaths({ [HOME_ENV_VAR]: "   " });
      const platform = resolveAppPaths({});

      expect(blank).toEqual(platform);
    });
  });
});
