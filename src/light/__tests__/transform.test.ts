/**
 * Light Module - Transform Tests
 */
import { describe, expect, it } from "vitest";

import type { DeviceRecord } from "../../mesh/index.js";
import { MAX_MIREDS, MIN_MIREDS } from "../schema.js";
import {
  brightnessToLightness,
  defaultColorMode,
  deriveLightState,
  kelvinToMired,
  lightUniqueId,
  lightnessToBrightness,
  miredToKelvin,
  parseOnOff,
  planTurnOff,
  planTurnOn,
  supportedColorModes,
} from "../transform.js";

function record(overrides: Partial<DeviceRecord> = {}): DeviceRecord {
  return {
    name: "Kitchen",
    kind: "lights",
    model: null,
    capabilities: ["brightness", "color_temp", "hs"],
    metadata: { name: "Kitchen" },
    status: null,
    ...overrides,
  };
}

// =============================================================================
// Conversions
// =============================================================================

describe("unit conversions", () => {
  it("converts Kelvin to mireds, rounding down", () => {
    expect(kelvinToMired(20000)).toBe(50);
    expect(kelvinToMired(800)).toBe(1250);
    expect(kelvinToMired(2700)).toBe(370);
  });

  it("converts mireds to Kelvin, rounding down", () => {
    expect(miredToKelvin(250)).toBe(4000);
    expect(miredToKelvin(370)).toBe(2702);
  });

  it("exposes the mired range", () => {
    expect(MIN_MIREDS).toBe(50);
    expect(MAX_MIREDS).toBe(1250);
  });

  it("scales lightness to brightness, truncating", () => {
    expect(lightnessToBrightness(0.5)).toBe(127);
    expect(lightnessToBrightness(1)).toBe(255);
    expect(lightnessToBrightness(0)).toBe(0);
  });

  it("scales brightness to lightness", () => {
    expect(brightnessToLightness(255)).toBe(1);
    expect(brightnessToLightness(51)).toBe(0.2);
  });
});

describe("lightUniqueId", () => {
  it("joins entry, kind and name without slashes", () => {
    expect(lightUniqueId("broker_haefele/gateway", "groups", "Downstairs")).toBe(
      "broker_haefele_gateway_groups_Downstairs",
    );
  });
});

describe("parseOnOff", () => {
  it("accepts booleans", () => {
    expect(parseOnOff(true)).toBe(true);
    expect(parseOnOff(false)).toBe(false);
  });

  it("accepts on/off strings in any case", () => {
    expect(parseOnOff("ON")).toBe(true);
    expect(parseOnOff("on")).toBe(true);
    expect(parseOnOff("off")).toBe(false);
  });

  it("treats anything else as off", () => {
    expect(parseOnOff(1)).toBe(false);
    expect(parseOnOff(undefined)).toBe(false);
  });
});

// =============================================================================
// Color Modes
// =============================================================================

describe("color modes", () => {
  it("maps capabilities to modes", () => {
    expect(supportedColorModes(["brightness", "hs"])).toEqual([
      "brightness",
      "hs",
    ]);
    expect(supportedColorModes(["brightness"])).toEqual(["brightness"]);
  });

  it("prefers hs, then color_temp", () => {
    expect(defaultColorMode(["brightness", "color_temp", "hs"])).toBe("hs");
    expect(defaultColorMode(["brightness", "color_temp"])).toBe("color_temp");
    expect(defaultColorMode(["brightness"])).toBe("brightness");
  });
});

// =============================================================================
// State Derivation
// =============================================================================

describe("deriveLightState", () => {
  it("converts status into entity units", () => {
    const state = deriveLightState(
      "id-1",
      record({
        model: "Strip",
        status: {
          onOff: "on",
          lightness: 0.5,
          hue: 200,
          saturation: 0.25,
          temperature: 4000,
        },
      }),
      true,
      "hs",
    );

    expect(state).toEqual({
      uniqueId: "id-1",
      name: "Kitchen",
      kind: "lights",
      model: "Strip",
      available: true,
      isOn: true,
      brightness: 127,
      hsColor: [200, 25],
      colorTemp: 250,
      colorMode: "hs",
      supportedColorModes: ["brightness", "color_temp", "hs"],
      minMireds: 50,
      maxMireds: 1250,
    });
  });

  it("reports unknown status as off with no values", () => {
    const state = deriveLightState("id-1", record(), false, "hs");

    expect(state.isOn).toBe(false);
    expect(state.brightness).toBeNull();
    expect(state.hsColor).toBeNull();
    expect(state.colorTemp).toBeNull();
    expect(state.available).toBe(false);
  });

  it("hides colors the light does not support", () => {
    const state = deriveLightState(
      "id-1",
      record({
        capabilities: ["brightness"],
        status: { onOff: true, hue: 10, saturation: 0.5, temperature: 3000 },
      }),
      true,
      "hs",
    );

    expect(state.hsColor).toBeNull();
    expect(state.colorTemp).toBeNull();
    expect(state.colorMode).toBe("brightness");
  });

  it("needs both hue and saturation for a color", () => {
    const state = deriveLightState(
      "id-1",
      record({ status: { hue: 10 } }),
      true,
      "hs",
    );

    expect(state.hsColor).toBeNull();
  });
});

// =============================================================================
// Command Planning
// =============================================================================

describe("planTurnOn", () => {
  const allModes = ["brightness", "color_temp", "hs"] as const;

  it("switches on when nothing else is requested", () => {
    expect(planTurnOn(allModes, {})).toEqual({
      command: { type: "power", on: true },
      optimistic: { onOff: true },
      colorMode: null,
    });
  });

  it("sets lightness for a brightness-only request", () => {
    expect(planTurnOn(allModes, { brightness: 51 })).toEqual({
      command: { type: "lightness", lightness: 0.2 },
      optimistic: { onOff: true, lightness: 0.2 },
      colorMode: null,
    });
  });

  it("sends HSL for a color request", () => {
    expect(
      planTurnOn(allModes, { hsColor: [120.7, 50], brightness: 255 }),
    ).toEqual({
      command: { type: "hsl", hue: 120, saturation: 0.5, lightness: 1 },
      optimistic: { onOff: true, lightness: 1, hue: 120, saturation: 0.5 },
      colorMode: "hs",
    });
  });

  it("defaults lightness to full for a color without brightness", () => {
    const plan = planTurnOn(allModes, { colorTemp: 250 });

    expect(plan.command).toEqual({
      type: "ctl",
      temperature: 4000,
      lightness: 1,
    });
    expect(plan.optimistic).toEqual({ onOff: true, temperature: 4000 });
    expect(plan.colorMode).toBe("color_temp");
  });

  it("carries brightness into CTL", () => {
    expect(planTurnOn(allModes, { colorTemp: 370, brightness: 102 }).command).toEqual(
      { type: "ctl", temperature: 2702, lightness: 0.4 },
    );
  });

  it("prefers HSL when both color forms are requested", () => {
    const plan = planTurnOn(allModes, { hsColor: [30, 100], colorTemp: 250 });

    expect(plan.command.type).toBe("hsl");
    expect(plan.optimistic).toEqual({
      onOff: true,
      hue: 30,
      saturation: 1,
      temperature: 4000,
    });
  });

  it("skips an unsupported color and falls back to power", () => {
    const plan = planTurnOn(["brightness"], { hsColor: [120, 50] });

    expect(plan.command).toEqual({ type: "power", on: true });
    expect(plan.optimistic).toEqual({ onOff: true, hue: 120, saturation: 0.5 });
    expect(plan.colorMode).toBeNull();
  });

  it("falls back to lightness when the color is unsupported", () => {
    const plan = planTurnOn(["brightness", "hs"], {
      colorTemp: 250,
      brightness: 51,
    });

    expect(plan.command).toEqual({ type: "lightness", lightness: 0.2 });
  });
});

describe("planTurnOff", () => {
  it("switches off", () => {
    expect(planTurnOff()).toEqual({
      command: { type: "power", on: false },
      optimistic: { onOff: false },
      colorMode: null,
    });
  });
});
