import { describe, it, expect, vi, afterEach } from "vitest";
import { EventBus } from "../../events/bus";
import { CaptureCancelledError, CaptureTimeoutError, ControlValueCache, ControlValueCell } from "../controlCache";
import type { CapturedControlValue } from "../controlCache";
import { controlKey, deviceKey } from "../eventKeys";
import { publishMidiMessage } from "../registry";
import { decodeMidi } from "../decoder";
import type { MidiDevice, MidiMessage } from "../types";

const knobs: MidiDevice = { vendor: "Acme", name: "Knobs", description: "Acme:Knobs 28:0", handle: "Acme:Knobs 28:0" };
const faders: MidiDevice = { vendor: "Acme", name: "Faders", description: "Acme:Faders 32:0", handle: "Acme:Faders 32:0" };

function cc(bus: EventBus<MidiMessage>, dev: MidiDevice, controller: number, value: number): void {
  const msg = decodeMidi([0xb0, controller, value], dev, value * 10);
  if (!msg) throw new Error("invalid frame");
  publishMidiMessage(bus, msg);
}

describe("midi/ControlValueCache", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("memoizes one cell per control key", () => {
    const bus = new EventBus<MidiMessage>();
    const cache = new ControlValueCache(bus, "t");
    const k = controlKey(knobs, "controlChange", 5);
    const cell = cache.latestFor(k);
    expect(cache.latestFor([...k])).toBe(cell);
    expect(bus.subscriberCount(k)).toBe(1);
    expect(cache.trackedKeys()).toEqual([k]);
    expect(cell.value).toBe(0);
    expect(cell.latest).toBeNull();
  });

  it("exposes no public write path: only the owner's writer updates a cell", () => {
    const writers: Array<(u: CapturedControlValue) => void> = [];
    const cell = new ControlValueCell(["k"], (write) => { writers.push(write); });
    expect(writers).toHaveLength(1);
    expect("write" in cell).toBe(false);
    writers[0]({ controller: 7, value: 42 });
    expect(cell.value).toBe(42);
    expect(cell.latest).toEqual({ controller: 7, value: 42 });
  });

  it("applies values in arrival order without interference from another key", async () => {
    const bus = new EventBus<MidiMessage>();
    const cache = new ControlValueCache(bus, "t");
    const cell = cache.latestFor(controlKey(knobs, "controlChange", 5));
    const other = cache.latestFor(controlKey(faders, "controlChange", 5));
    const seen: number[] = [];
    cell.watch((u: CapturedControlValue) => seen.push(u.value));

    cc(bus, knobs, 5, 1);
    cc(bus, faders, 5, 100);
    cc(bus, knobs, 5, 2);
    cc(bus, faders, 5, 101);
    cc(bus, knobs, 5, 3);

    expect(cell.value).toBe(3);
    expect(cell.latest).toEqual({ controller: 5, value: 3, timestamp: 30 });
    expect(other.value).toBe(101);
    expect(seen).toEqual([]);
    await cell.settled();
    expect(seen).toEqual([1, 2, 3]);
  });

  it("keeps notifying other watchers when one throws", async () => {
    const bus = new EventBus<MidiMessage>();
    const cache = new ControlValueCache(bus, "t");
    const cell = cache.latestFor(controlKey(knobs, "controlChange", 7));
    const good = vi.fn();
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    cell.watch(() => { throw new Error("watcher"); });
    const stop = cell.watch(good);
    cc(bus, knobs, 7, 42);
    await cell.settled();
    expect(good).toHaveBeenCalledWith({ controller: 7, value: 42, timestamp: 420 });
    stop();
    cc(bus, knobs, 7, 43);
    await cell.settled();
    expect(good).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it("captureNext resolves once with the first control change only", async () => {
    const bus = new EventBus<MidiMessage>();
    const cache = new ControlValueCache(bus, "t");
    const p = cache.captureNext();
    cc(bus, knobs, 21, 9);
    cc(bus, knobs, 22, 10);
    cc(bus, faders, 23, 11);
    await expect(p).resolves.toEqual({ controller: 21, value: 9 });
    expect(cache.pendingCaptures()).toBe(0);
    expect(bus.subscriberCount()).toBe(0);
  });

  it("captureNext can include the device key", async () => {
    const bus = new EventBus<MidiMessage>();
    const cache = new ControlValueCache(bus, "t");
    const p = cache.captureNext({ includeKey: true });
    cc(bus, faders, 12, 64);
    await expect(p).resolves.toEqual({ controller: 12, value: 64, key: deviceKey(faders, "controlChange") });
  });

  it("parallel captures both resolve", async () => {
    const bus = new EventBus<MidiMessage>();
    const cache = new ControlValueCache(bus, "t");
    const a = cache.captureNext();
    const b = cache.captureNext();
    cc(bus, knobs, 30, 1);
    await expect(Promise.all([a, b])).resolves.toEqual([
      { controller: 30, value: 1 },
      { controller: 30, value: 1 },
    ]);
  });

  it("derives device and control keys from the next input", async () => {
    const bus = new EventBus<MidiMessage>();
    const cache = new ControlValueCache(bus, "t");
    const dk = cache.captureNextControlKey();
    cc(bus, knobs, 40, 1);
    await expect(dk).resolves.toEqual(deviceKey(knobs, "controlChange"));

    const ck = cache.captureNextControlSpecificKey();
    cc(bus, faders, 41, 2);
    await expect(ck).resolves.toEqual(controlKey(faders, "controlChange", 41));
  });

  it("rejects after the timeout and removes the subscription", async () => {
    vi.useFakeTimers();
    const bus = new EventBus<MidiMessage>();
    const cache = new ControlValueCache(bus, "t");
    const p = cache.captureNext({ timeoutMs: 500 });
    const assertion = expect(p).rejects.toBeInstanceOf(CaptureTimeoutError);
    vi.advanceTimersByTime(500);
    await assertion;
    expect(bus.subscriberCount()).toBe(0);
    expect(cache.pendingCaptures()).toBe(0);
  });

  it("dispose unsubscribes cells and cancels pending captures", async () => {
    const bus = new EventBus<MidiMessage>();
    const cache = new ControlValueCache(bus, "t");
    const cell = cache.latestFor(controlKey(knobs, "controlChange", 5));
    const p = cache.captureNext();
    cache.dispose();
    await expect(p).rejects.toBeInstanceOf(CaptureCancelledError);
    expect(bus.subscriberCount()).toBe(0);
    cc(bus, knobs, 5, 9);
    expect(cell.value).toBe(0);
  });
});
