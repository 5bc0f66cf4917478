import { mkdtempSync, writeFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, it, expect, vi } from "vitest";
import { loadConfig, defaultRegistrationClientConfig } from "./config.js";
import type { Logger } from "./types/logger.js";

const silentLogger: Logger = { info: vi.fn() };

describe("loadConfig", () => {
  let tempDir: string | undefined;

  afterEach(() => {
    if (tempDir) rmSync(tempDir, { recursive: true, force: true });
    tempDir = undefined;
  });

  it("should read port, user and key from KEYREG_* variables", () => {
    const job = loadConfig({
      env: { KEYREG_PORT: "4000", KEYREG_USER: "alice", KEYREG_KEY: "test-key" },
      log: silentLogger,
    });

    expect(job).toEqual({
      port: 4000,
      user: "alice",
      key: "test-key",
      client: { host: "localhost", requestTimeoutMs: 10_000 },
    });
  });

  it("should default to localhost and a 10 second timeout", () => {
    expect(defaultRegistrationClientConfig).toEqual({ host: "localhost", requestTimeoutMs: 10_000 });
  });

  it("should honour host and timeout overrides", () => {
    const job = loadConfig({
      env: {
        KEYREG_PORT: "4000",
        KEYREG_USER: "alice",
        KEYREG_KEY: "test-key",
        KEYREG_HOST: "127.0.0.1",
        KEYREG_TIMEOUT_MS: "2500",
      },
      log: silentLogger,
    });

    expect(job.client).toEqual({ host: "127.0.0.1", requestTimeoutMs: 2500 });
  });

  it("should fall back to USER for the name", () => {
    const job = loadConfig({
      env: { KEYREG_PORT: "4000", USER: "bob", KEYREG_KEY: "test-key" },
      log: silentLogger,
    });

    expect(job.user).toBe("bob");
  });

  it("should read and trim the key from KEYREG_KEY_FILE", () => {
    tempDir = mkdtempSync(join(tmpdir(), "keyreg-config-"));
    const keyPath = join(tempDir, "id.pub");
    writeFileSync(keyPath, "ssh-ed25519 AAAAtest alice@host\n");

    const job = loadConfig({
      env: { KEYREG_PORT: "4000", KEYREG_USER: "alice", KEYREG_KEY_FILE: keyPath },
      log: silentLogger,
    });

    expect(job.key).toBe("ssh-ed25519 AAAAtest alice@host");
  });

  it("should prefer KEYREG_KEY over KEYREG_KEY_FILE", () => {
    const job = loadConfig({
      env: { KEYREG_PORT: "4000", KEYREG_USER: "alice", KEYREG_KEY: "inline", KEYREG_KEY_FILE: "/does/not/exist" },
      log: silentLogger,
    });

    expect(job.key).toBe("inline");
  });

  it("should reject a missing key file", () => {
    expect(() =>
      loadConfig({
        env: { KEYREG_PORT: "4000", KEYREG_USER: "alice", KEYREG_KEY_FILE: "/does/not/exist" },
        log: silentLogger,
      })
    ).toThrow("keyreg-client:config - Key file not found: /does/not/exist");
  });

  it("should reject an out-of-range port", () => {
    expect(() =>
      loadConfig({ env: { KEYREG_PORT: "70000", KEYREG_USER: "alice", KEYREG_KEY: "k" }, log: silentLogger })
    ).toThrow(/Invalid environment: KEYREG_PORT/);
  });

  it("should reject a timeout larger than a timer can hold", () => {
    expect(() =>
      loadConfig({
        env: { KEYREG_PORT: "4000", KEYREG_USER: "alice", KEYREG_KEY: "k", KEYREG_TIMEOUT_MS: "3000000000" },
        log: silentLogger,
      })
    ).toThrow(/Invalid environment: KEYREG_TIMEOUT_MS/);
  });

  it("should accept the largest timeout a timer can hold", () => {
    const job = loadConfig({
      env: { KEYREG_PORT: "4000", KEYREG_USER: "alice", KEYREG_KEY: "k", KEYREG_TIMEOUT_MS: "2147483647" },
      log: silentLogger,
    });

    expect(job.client.requestTimeoutMs).toBe(2_147_483_647);
  });

  it("should reject a missing port", () => {
    expect(() => loadConfig({ env: { KEYREG_USER: "alice", KEYREG_KEY: "k" }, log: silentLogger })).toThrow(
      /Invalid environment: KEYREG_PORT/
    );
  });

  it("should require a user", () => {
    expect(() => loadConfig({ env: { KEYREG_PORT: "4000", KEYREG_KEY: "k" }, log: silentLogger })).toThrow(
      "keyreg-client:config - KEYREG_USER (or USER) is required"
    );
  });

  it("should require a key", () => {
    expect(() => loadConfig({ env: { KEYREG_PORT: "4000", KEYREG_USER: "alice" }, log: silentLogger })).toThrow(
      "keyreg-client:config - KEYREG_KEY or KEYREG_KEY_FILE is required"
    );
  });
});
