/**
 * Tests for DbtRunner: exit codes, spawn failures and DBT_PROFILES_DIR.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { EventEmitter } from "events";
import * as os from "os";
import type { SpawnOptions } from "child_process";
import { DbtRunner, SPAWN_FAILED_EXIT_CODE, childEnv, signalExitCode, type SpawnFn } from "../../src/lib/dbt.js";
import { silentLogger } from "../../src/lib/logger.js";

interface SpawnCall {
  command: string;
  args: string[];
  options: SpawnOptions;
}

/** A spawn that records its call and lets the test drive the child. */
function fakeSpawn(drive: (child: EventEmitter) => void, calls: SpawnCall[] = []): SpawnFn {
  return (command, args, options) => {
    calls.push({ command, args, options });
    const child = new EventEmitter();
    setImmediate(() => drive(child));
    return child;
  };
}

describe("DbtRunner", () => {
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it("passes arguments through and returns the exit code", async () => {
    const calls: SpawnCall[] = [];
    const runner = new DbtRunner({ logger: silentLogger(), spawn: fakeSpawn((c) => c.emit("exit", 3, null), calls) });
    const code = await runner.run(["run", "--select", "orders"], { cwd: "/work/shop", env: {}, profilesDir: "/home/u/.dbt" });

    expect(code).toBe(3);
    expect(calls).toHaveLength(1);
    expect(calls[0].command).toBe("dbt");
    expect(calls[0].args).toEqual(["run", "--select", "orders"]);
    expect(calls[0].options.cwd).toBe("/work/shop");
    expect(calls[0].options.stdio).toBe("inherit");
    expect(calls[0].options.env).toEqual({ DBT_PROFILES_DIR: "/home/u/.dbt" });
  });

  it("uses a custom binary", async () => {
    const calls: SpawnCall[] = [];
    const runner = new DbtRunner({ bin: "/opt/dbt/bin/dbt", logger: silentLogger(), spawn: fakeSpawn((c) => c.emit("exit", 0, null), calls) });
    await runner.run(["debug"], { cwd: "/tmp", env: {} });
    expect(calls[0].command).toBe("/opt/dbt/bin/dbt");
  });

  it("maps a signal to 128 + its number", async () => {
    const runner = new DbtRunner({ logger: silentLogger(), spawn: fakeSpawn((c) => c.emit("exit", null, "SIGINT")) });
    expect(await runner.run(["run"], { cwd: "/tmp", env: {} })).toBe(128 + os.constants.signals.SIGINT);
    expect(signalExitCode("SIGTERM")).toBe(143);
  });

  it("returns 127 when dbt cannot be started", async () => {
    const runner = new DbtRunner({
      logger: silentLogger(),
      spawn: fakeSpawn((c) => c.emit("error", new Error("spawn dbt ENOENT"))),
    });
    expect(await runner.run(["run"], { cwd: "/tmp", env: {} })).toBe(SPAWN_FAILED_EXIT_CODE);
    expect(errorSpy).toHaveBeenCalledWith("Error: could not run 'dbt': spawn dbt ENOENT");
  });

  it("returns 127 when spawn itself throws", async () => {
    const runner = new DbtRunner({
      logger: silentLogger(),
      spawn: () => {
        throw new Error("EACCES");
      },
    });
    expect(await runner.run(["run"], { cwd: "/tmp", env: {} })).toBe(127);
  });
});

describe("childEnv", () => {
  it("leaves a user-chosen profiles dir alone", () => {
    expect(childEnv(["run", "--profiles-dir", "/x"], { cwd: "/", env: {}, profilesDir: "/y" })).toEqual({});
    expect(childEnv(["run", "--profiles-dir=/x"], { cwd: "/", env: {}, profilesDir: "/y" })).toEqual({});
    expect(childEnv(["run"], { cwd: "/", env: { DBT_PROFILES_DIR: "/x" }, profilesDir: "/y" })).toEqual({ DBT_PROFILES_DIR: "/x" });
  });

  it("does not modify the given env", () => {
    const env = { PATH: "/bin" };
    expect(childEnv(["run"], { cwd: "/", env, profilesDir: "/y" })).toEqual({ PATH: "/bin", DBT_PROFILES_DIR: "/y" });
    expect(env).toEqual({ PATH: "/bin" });
  });
});
