import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { commandKey, controlKey, deviceKey, eventKeyId, formatEventKey, isPrefixOf } from "../eventKeys";
import type { MidiCommand, MidiDevice } from "../types";

const dev: MidiDevice = { vendor: "Acme", name: "Pads", description: "Acme:Pads 24:0", handle: "Acme:Pads 24:0" };

const commands: MidiCommand[] = [
  "noteOff",
  "noteOn",
  "polyAftertouch",
  "controlChange",
  "programChange",
  "channelAftertouch",
  "pitchBend",
];

describe("midi/eventKeys", () => {
  it("builds command, device and control keys", () => {
    expect(commandKey("noteOn")).toEqual(["midi", "noteOn"]);
    expect(deviceKey(dev, "controlChange")).toEqual(["midi-device", "Acme", "Pads", "Acme:Pads 24:0", "controlChange"]);
    expect(controlKey(dev, "controlChange", 22)).toEqual([
      "midi-device",
      "Acme",
      "Pads",
      "Acme:Pads 24:0",
      "controlChange",
      22,
    ]);
  });

  it("controlKey is deviceKey extended by the control id", () => {
    const device = fc.record({
      vendor: fc.string(),
      name: fc.string(),
      description: fc.string(),
      handle: fc.string(),
    });
    fc.assert(
      fc.property(device, fc.constantFrom(...commands), fc.integer({ min: 0, max: 127 }), (d, cmd, id) => {
        const dk = deviceKey(d, cmd);
        const ck = controlKey(d, cmd, id);
        return eventKeyId(ck) === eventKeyId([...dk, id]) && isPrefixOf(dk, ck);
      })
    );
  });

  it("distinguishes numeric and string atoms in ids", () => {
    expect(eventKeyId(["midi", 5])).not.toBe(eventKeyId(["midi", "5"]));
    expect(eventKeyId(["a|b", "c"])).not.toBe(eventKeyId(["a", "b|c"]));
  });

  it("checks prefixes and formats keys", () => {
    expect(isPrefixOf(["midi"], ["midi", "noteOn"])).toBe(true);
    expect(isPrefixOf(["midi", "noteOn"], ["midi"])).toBe(false);
    expect(isPrefixOf(["midi", "noteOff"], ["midi", "noteOn"])).toBe(false);
    expect(formatEventKey(controlKey(dev, "noteOn", 60))).toBe("midi-device/Acme/Pads/Acme:Pads 24:0/noteOn/60");
  });
});
