import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { EventBus } from "../../events/bus";
import { InstrumentController, linearScale, mappingFromConfig } from "../controller";
import type { ControlBinding, ControlState } from "../controller";
import { publishMidiMessage } from "../registry";
import { decodeMidi } from "../decoder";
import type { MidiDevice, MidiMessage } from "../types";
import { setLogLevel, getLogLevel } from "../../logger";

const knobs: MidiDevice = { vendor: "Acme", name: "Knobs", description: "Acme:Knobs 28:0", handle: "Acme:Knobs 28:0" };
const other: MidiDevice = { vendor: "Acme", name: "Other", description: "Acme:Other 32:0", handle: "Acme:Other 32:0" };

function cc(bus: EventBus<MidiMessage>, controller: number, value: number, dev: MidiDevice = knobs): void {
  const msg = decodeMidi([0xb0, controller, value], dev);
  if (!msg) throw new Error("invalid frame");
  publishMidiMessage(bus, msg);
}

const dingMapping = new Map<number, ControlBinding>([
  [22, { name: "attack", scale: (v) => 0.3 * (v / 127) }],
  [23, { name: "decay", scale: (v) => 0.6 * (v / 127) }],
]);

describe("midi/InstrumentController", () => {
  const origLevel = getLogLevel();
  beforeEach(() => setLogLevel("error"));
  afterEach(() => setLogLevel(origLevel));

  it("scales the raw value, stores it and calls the handler once", () => {
    const bus = new EventBus<MidiMessage>();
    const state: ControlState = new Map();
    const handler = vi.fn();
    new InstrumentController({ bus, id: "ding", state, handler, mapping: dingMapping });
    cc(bus, 22, 127);
    expect(state.get("attack")).toBe(0.3);
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith("attack", 0.3);
  });

  it("applies updates in arrival order", () => {
    const bus = new EventBus<MidiMessage>();
    const state: ControlState = new Map();
    const seen: number[] = [];
    const mapping = new Map<number, ControlBinding>([[5, { name: "cutoff", scale: (v) => v }]]);
    new InstrumentController({ bus, id: "filter", state, handler: (_n, v) => seen.push(v), mapping });
    cc(bus, 5, 1);
    cc(bus, 5, 2);
    cc(bus, 5, 3);
    expect(seen).toEqual([1, 2, 3]);
    expect(state.get("cutoff")).toBe(3);
  });

  it("ignores unmapped controls and reports them", () => {
    const bus = new EventBus<MidiMessage>();
    const state: ControlState = new Map();
    const handler = vi.fn();
    const onUnmapped = vi.fn();
    new InstrumentController({ bus, id: "ding", state, handler, mapping: dingMapping, onUnmapped });
    cc(bus, 99, 64);
    expect(state.size).toBe(0);
    expect(handler).not.toHaveBeenCalled();
    expect(onUnmapped).toHaveBeenCalledTimes(1);
    expect(onUnmapped.mock.calls[0][0]).toMatchObject({ controller: 99, value: 64 });
  });

  it("listens to one device when given and stops on request", () => {
    const bus = new EventBus<MidiMessage>();
    const state: ControlState = new Map();
    const handler = vi.fn();
    const ctl = new InstrumentController({ bus, id: "ding", state, handler, mapping: dingMapping, device: knobs });
    cc(bus, 23, 127, other);
    expect(handler).not.toHaveBeenCalled();
    cc(bus, 23, 127, knobs);
    expect(state.get("decay")).toBe(0.6);

    ctl.stop();
    expect(ctl.isActive).toBe(false);
    expect(bus.has("inst-controller:ding:control-change")).toBe(false);
    cc(bus, 23, 0, knobs);
    expect(state.get("decay")).toBe(0.6);
  });

  it("ignores non control-change messages passed directly", () => {
    const bus = new EventBus<MidiMessage>();
    const ctl = new InstrumentController({ bus, id: "ding", state: new Map(), handler: vi.fn(), mapping: dingMapping });
    const note = decodeMidi([0x90, 22, 127], knobs);
    expect(note && ctl.handle(note)).toBe(false);
  });
});

describe("midi/controller mapping helpers", () => {
  it("linearScale maps 0..127 onto min..max", () => {
    const s = linearScale(-1, 1);
    expect(s(0)).toBe(-1);
    expect(s(127)).toBe(1);
  });

  it("mappingFromConfig keeps valid controller numbers only", () => {
    const m = mappingFromConfig({
      "22": { name: "attack", max: 0.3 },
      "24": { name: "sustain" },
      "200": { name: "out-of-range" },
      knob: { name: "not-a-number" },
    });
    expect(Array.from(m.keys())).toEqual([22, 24]);
    expect(m.get(22)?.name).toBe("attack");
    expect(m.get(22)?.scale(127)).toBe(0.3);
    expect(m.get(24)?.scale(0)).toBe(0);
  });
});
