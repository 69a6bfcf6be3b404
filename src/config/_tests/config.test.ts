import { describe, it, expect, afterEach } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { findConfigPath, loadConfig, resolveConfig } from "../../config";

function yaml(contents: string): string {
  return contents.trimStart();
}

describe("config", () => {
  const tmpDirs: string[] = [];
  const makeTmp = async (): Promise<string> => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "midihub-config-"));
    tmpDirs.push(dir);
    return dir;
  };

  afterEach(async () => {
    await Promise.all(tmpDirs.splice(0).map((d) => fs.rm(d, { recursive: true, force: true })));
  });

  it("findConfigPath returns the custom path when file exists", async () => {
    const tmp = await makeTmp();
    const p = path.join(tmp, "config.yaml");
    await fs.writeFile(p, yaml(`
midi:
  poll_enabled: true
`), "utf8");
    const found = await findConfigPath(p);
    expect(found).toBe(p);
  });

  it("loadConfig parses YAML and returns structured object", async () => {
    const tmp = await makeTmp();
    const p = path.join(tmp, "my-config.yaml");
    await fs.writeFile(p, yaml(`
log_level: debug
midi:
  poll_enabled: true
  poll_interval_ms: 500
  excluded_devices: ["Midi Through", "loopMIDI Port"]
capture:
  timeout_ms: 0
instruments:
  ding:
    device: "KeyStep"
    controls:
      22: { name: attack, min: 0, max: 0.3 }
      23: { name: decay, max: 0.6 }
`), "utf8");
    const cfg = await loadConfig(p);
    expect(cfg.log_level).toBe("debug");
    expect(cfg.midi).toEqual({
      poll_enabled: true,
      poll_interval_ms: 500,
      excluded_devices: ["Real Time Sequencer", "Java Sound Synthesizer", "Midi Through", "loopMIDI Port"],
    });
    expect(cfg.capture.timeout_ms).toBe(0);
    expect(cfg.instruments.ding.device).toBe("KeyStep");
    expect(cfg.instruments.ding.play).toBe(true);
    expect(cfg.instruments.ding.controls).toEqual({
      "22": { name: "attack", min: 0, max: 0.3 },
      "23": { name: "decay", min: undefined, max: 0.6 },
    });
  });

  it("resolveConfig applies defaults and drops invalid values", () => {
    const cfg = resolveConfig({
      log_level: "loud",
      midi: { poll_interval_ms: -5, excluded_devices: ["A", 3] },
      instruments: { bad: 1, ok: { play: false, controls: { "7": { min: 1 } } } },
    });
    expect(cfg.log_level).toBeUndefined();
    expect(cfg.midi).toEqual({
      poll_enabled: false,
      poll_interval_ms: 2000,
      excluded_devices: ["Real Time Sequencer", "Java Sound Synthesizer", "Midi Through", "A"],
    });
    expect(cfg.capture.timeout_ms).toBe(30000);
    expect(cfg.instruments).toEqual({ ok: { device: undefined, play: false, controls: {} } });
  });

  it("resolveConfig on an empty document gives the defaults", () => {
    expect(resolveConfig(null)).toEqual({
      log_level: undefined,
      midi: {
        poll_enabled: false,
        poll_interval_ms: 2000,
        excluded_devices: ["Real Time Sequencer", "Java Sound Synthesizer", "Midi Through"],
      },
      capture: { timeout_ms: 30000 },
      instruments: {},
    });
  });
});
