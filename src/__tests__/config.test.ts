import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  applyOverrides,
  defaultConfig,
  loadConfig,
  mergeWithDefaults,
} from "../config";
import { ConfigError, InvalidJsonError, SchemaValidationError } from "../errors";
import { cleanup, makeTempDir } from "./helpers";

describe("config", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir("lazyserve-config-");
  });

  afterEach(async () => {
    await cleanup(tempDir);
  });

  describe("defaultConfig", () => {
    it("serves and watches the working directory on port 3000", () => {
      expect(defaultConfig("/work")).toEqual({
        port: 3000,
        host: "localhost",
        serve: "/work",
        watch: "/work",
        ignore: [],
        command: "",
        failure_status: 200,
      });
    });
  });

  describe("mergeWithDefaults", () => {
    it("resolves relative paths against the config file directory", () => {
      const config = mergeWithDefaults(
        { serve: "public", ignore: ["public", "/abs/logs"] },
        "/work",
        "/work/site",
      );

      expect(config.serve).toBe("/work/site/public");
      expect(config.watch).toBe("/work");
      expect(config.ignore).toEqual(["/work/site/public", "/abs/logs"]);
    });
  });

  describe("applyOverrides", () => {
    it("lets CLI values win and appends ignores", () => {
      const base = mergeWithDefaults(
        { port: 4000, command: "make", ignore: ["out"] },
        "/work",
      );

      const config = applyOverrides(
        base,
        { port: 5000, ignore: ["tmp"], command: "npm run build", serve: "dist" },
        "/work",
      );

      expect(config.port).toBe(5000);
      expect(config.command).toBe("npm run build");
      expect(config.serve).toBe("/work/dist");
      expect(config.ignore).toEqual(["/work/out", "/work/tmp"]);
    });

    it("keeps the file command when the CLI gives none", () => {
      const base = mergeWithDefaults({ command: ["make", "site"] }, "/work");

      expect(applyOverrides(base, { command: "" }, "/work").command).toEqual([
        "make",
        "site",
      ]);
      expect(applyOverrides(base, {}, "/work").command).toEqual(["make", "site"]);
    });
  });

  describe("loadConfig", () => {
    it("returns defaults when no config file exists", async () => {
      expect(await loadConfig({ cwd: tempDir })).toEqual(defaultConfig(tempDir));
    });

    it("reads lazyserve.json from the working directory", async () => {
      await fs.writeFile(
        path.join(tempDir, "lazyserve.json"),
        JSON.stringify({ port: 8080, command: "make", ignore: ["build"], failure_status: 500 }),
      );

      const config = await loadConfig({ cwd: tempDir });

      expect(config.port).toBe(8080);
      expect(config.command).toBe("make");
      expect(config.ignore).toEqual([path.join(tempDir, "build")]);
      expect(config.failure_status).toBe(500);
    });

    it("applies overrides over the file", async () => {
      await fs.writeFile(path.join(tempDir, "lazyserve.json"), JSON.stringify({ port: 8080 }));

      const config = await loadConfig({ cwd: tempDir, overrides: { port: 9090 } });

      expect(config.port).toBe(9090);
    });

    it("reads an explicit config path", async () => {
      await fs.mkdir(path.join(tempDir, "conf"));
      await fs.writeFile(
        path.join(tempDir, "conf", "dev.json"),
        JSON.stringify({ serve: "../www" }),
      );

      const config = await loadConfig({ cwd: tempDir, configPath: "conf/dev.json" });

      expect(config.serve).toBe(path.join(tempDir, "www"));
    });

    it("throws ConfigError when an explicit config file is missing", async () => {
      await expect(
        loadConfig({ cwd: tempDir, configPath: "missing.json" }),
      ).rejects.toBeInstanceOf(ConfigError);
    });

    it("throws InvalidJsonError for malformed JSON", async () => {
      await fs.writeFile(path.join(tempDir, "lazyserve.json"), "{ port: ");

      await expect(loadConfig({ cwd: tempDir })).rejects.toBeInstanceOf(InvalidJsonError);
    });

    it("throws SchemaValidationError for unknown keys", async () => {
      await fs.writeFile(path.join(tempDir, "lazyserve.json"), JSON.stringify({ prot: 1 }));

      await expect(loadConfig({ cwd: tempDir })).rejects.toBeInstanceOf(
        SchemaValidationError,
      );
    });

    it("throws SchemaValidationError for an out-of-range port", async () => {
      await fs.writeFile(path.join(tempDir, "lazyserve.json"), JSON.stringify({ port: 70000 }));

      await expect(loadConfig({ cwd: tempDir })).rejects.toBeInstanceOf(
        SchemaValidationError,
      );
    });
  });
});
