/**
 * Light Module - Pure Transformations
 *
 * Conversions between the gateway's units (lightness 0.0 - 1.0, Kelvin,
 * saturation 0.0 - 1.0) and the entity units (brightness 0 - 255, mireds,
 * saturation percent), plus turn-on planning.
 */
import type {
  DeviceKind,
  DeviceRecord,
  DeviceStatus,
  LightCapability,
} from "../mesh/index.js";
import type {
  ColorMode,
  LightPlan,
  LightState,
  TurnOnRequest,
} from "./schema.js";
import { MAX_MIREDS, MIN_MIREDS } from "./schema.js";

// =============================================================================
// Identifiers
// =============================================================================

/**
 * Stable entity id. Built from the record name, which never changes.
 * Slashes become underscores so the id fits in a single path segment.
 */
export function lightUniqueId(
  entryId: string,
  kind: DeviceKind,
  name: string,
): string {
  return `${entryId}_${kind}_${name}`.replaceAll("/", "_");
}

// =============================================================================
// Unit Conversions
// =============================================================================

export function kelvinToMired(kelvin: number): number {
  return Math.floor(1_000_000 / kelvin);
}

export function miredToKelvin(mired: number): number {
  return Math.floor(1_000_000 / mired);
}

export function lightnessToBrightness(lightness: number): number {
  return Math.trunc(lightness * 255);
}

export function brightnessToLightness(brightness: number): number {
  return brightness / 255;
}

/**
 * Interpret an `onOff` status value. The gateway reports either a boolean
 * or "on"/"off" in any case.
 */
export function parseOnOff(value: unknown): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") return value.toLowerCase() === "on";
  return false;
}

// =============================================================================
// Color Modes
// =============================================================================

export function supportedColorModes(
  capabilities: readonly LightCapability[],
): ColorMode[] {
  const modes: ColorMode[] = ["brightness"];
  if (capabilities.includes("color_temp")) modes.push("color_temp");
  if (capabilities.includes("hs")) modes.push("hs");
  return modes;
}

/**
 * Richest supported mode: hs, then color_temp, then brightness.
 */
export function defaultColorMode(modes: readonly ColorMode[]): ColorMode {
  if (modes.includes("hs")) return "hs";
  if (modes.includes("color_temp")) return "color_temp";
  return "brightness";
}

// =============================================================================
// State Derivation
// =============================================================================

function statusNumber(
  status: Readonly<DeviceStatus> | null,
  field: "lightness" | "hue" | "saturation" | "temperature",
): number | null {
  return status?.[field] ?? null;
}

/**
 * Derive the entity state shown for a registry record.
 */
export function deriveLightState(
  uniqueId: string,
  record: DeviceRecord,
  available: boolean,
  colorMode: ColorMode,
): LightState {
  const modes = supportedColorModes(record.capabilities);
  const status = record.status;

  const lightness = statusNumber(status, "lightness");
  const hue = statusNumber(status, "hue");
  const saturation = statusNumber(status, "saturation");
  const temperature = statusNumber(status, "temperature");

  return {
    uniqueId,
    name: record.name,
    kind: record.kind,
    model: record.model,
    available,
    isOn: parseOnOff(status?.onOff),
    brightness: lightness === null ? null : lightnessToBrightness(lightness),
    hsColor:
      modes.includes("hs") && hue !== null && saturation !== null
        ? [hue, saturation * 100]
        : null,
    colorTemp:
      modes.includes("color_temp") && temperature !== null
        ? kelvinToMired(temperature)
        : null,
    colorMode: modes.includes(colorMode) ? colorMode : defaultColorMode(modes),
    supportedColorModes: modes,
    minMireds: MIN_MIREDS,
    maxMireds: MAX_MIREDS,
  };
}

// =============================================================================
// Command Planning
// =============================================================================

/**
 * Pick the command for a turn-on request.
 *
 * A color request wins over a plain brightness change, HS over color
 * temperature; a color the light cannot show is skipped. Without any
 * applicable parameter the light is simply switched on. Lightness defaults
 * to full when only a color is given.
 *
 * The optimistic status records every requested field, supported or not.
 */
export function planTurnOn(
  modes: readonly ColorMode[],
  request: TurnOnRequest,
): LightPlan {
  const { brightness, hsColor, colorTemp } = request;
  const lightness =
    brightness === undefined ? 1 : brightnessToLightness(brightness);

  const optimistic: Partial<DeviceStatus> = { onOff: true };
  if (brightness !== undefined) {
    optimistic.lightness = brightnessToLightness(brightness);
  }
  if (hsColor) {
    optimistic.hue = Math.trunc(hsColor[0]);
    optimistic.saturation = hsColor[1] / 100;
  }
  if (colorTemp !== undefined) {
    optimistic.temperature = miredToKelvin(colorTemp);
  }

  if (hsColor && modes.includes("hs")) {
    return {
      command: {
        type: "hsl",
        hue: Math.trunc(hsColor[0]),
        saturation: hsColor[1] / 100,
        lightness,
      },
      optimistic,
      colorMode: "hs",
    };
  }

  if (colorTemp !== undefined && modes.includes("color_temp")) {
    return {
      command: {
        type: "ctl",
        temperature: miredToKelvin(colorTemp),
        lightness,
      },
      optimistic,
      colorMode: "color_temp",
    };
  }

  if (brightness !== undefined) {
    return {
      command: { type: "lightness", lightness },
      optimistic,
      colorMode: null,
    };
  }

  return {
    command: { type: "power", on: true },
    optimistic,
    colorMode: null,
  };
}

export function planTurnOff(): LightPlan {
  return {
    command: { type: "power", on: false },
    optimistic: { onOff: false },
    colorMode: null,
  };
}
