import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, loadConfig } from "../src/config";
import { createTestLogger } from "./helpers";

describe("loadConfig", () => {
  it("uses the defaults for an empty environment", () => {
    const logger = createTestLogger();

    expect(loadConfig({}, logger)).toEqual({
      DATABASE_PATH: "pool.sqlite",
      WORKER_TIMEOUT: 300,
      SWEEP_INTERVAL: 60,
      PORT: 8787,
      HOST: "0.0.0.0",
    });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("reads every setting from the environment", () => {
    const config = loadConfig(
      {
        DATABASE_PATH: "/var/lib/pool/pool.sqlite",
        WORKER_TIMEOUT: "600",
        SWEEP_INTERVAL: "30",
        PORT: "9000",
        HOST: "127.0.0.1",
      },
      createTestLogger()
    );

    expect(config).toEqual({
      DATABASE_PATH: "/var/lib/pool/pool.sqlite",
      WORKER_TIMEOUT: 600,
      SWEEP_INTERVAL: 30,
      PORT: 9000,
      HOST: "127.0.0.1",
    });
  });

  it.each(["0", "-10", "5m", "1.5"])("falls back when WORKER_TIMEOUT is %j", (raw) => {
    const logger = createTestLogger();

    expect(loadConfig({ WORKER_TIMEOUT: raw }, logger).WORKER_TIMEOUT).toBe(
      DEFAULT_CONFIG.WORKER_TIMEOUT
    );
    expect(logger.warn).toHaveBeenCalledWith("Invalid WORKER_TIMEOUT; using 300", { raw });
  });

  it("treats blank values as unset", () => {
    const logger = createTestLogger();

    const config = loadConfig({ DATABASE_PATH: "  ", SWEEP_INTERVAL: "" }, logger);

    expect(config.DATABASE_PATH).toBe("pool.sqlite");
    expect(config.SWEEP_INTERVAL).toBe(60);
    expect(logger.warn).not.toHaveBeenCalled();
  });
});
