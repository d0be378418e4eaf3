/**
 * Light Module - Schemas and Types
 *
 * Entity-level view of lights and groups: the state a home-automation
 * front end shows, and the turn-on request it sends.
 */
import { z } from "zod";

import type { DeviceKind, DeviceStatus } from "../mesh/index.js";

/**
 * How the light is currently being driven.
 */
export type ColorMode = "brightness" | "color_temp" | "hs";

/** Coolest and warmest white the gateway accepts. */
export const MAX_KELVIN = 20000;
export const MIN_KELVIN = 800;

/** Mired bounds (coolest first). */
export const MIN_MIREDS = Math.floor(1_000_000 / MAX_KELVIN);
export const MAX_MIREDS = Math.floor(1_000_000 / MIN_KELVIN);

// =============================================================================
// Turn-On Request
// =============================================================================

/**
 * Turn-on parameters. All optional; an empty request just switches on.
 */
export const TurnOnRequestSchema = z
  .object({
    brightness: z
      .number()
      .int()
      .min(0)
      .max(255)
      .optional()
      .describe("Brightness 0 - 255"),
    hsColor: z
      .tuple([z.number().min(0).max(360), z.number().min(0).max(100)])
      .optional()
      .describe("Hue in degrees, saturation in percent"),
    colorTemp: z
      .number()
      .int()
      .min(MIN_MIREDS)
      .max(MAX_MIREDS)
      .optional()
      .describe("Color temperature in mireds"),
  })
  .strict();

export type TurnOnRequest = z.infer<typeof TurnOnRequestSchema>;

// =============================================================================
// Commands
// =============================================================================

/**
 * The single bus command a turn-on or turn-off resolves to.
 */
export type LightCommand =
  | Readonly<{ type: "power"; on: boolean }>
  | Readonly<{ type: "lightness"; lightness: number }>
  | Readonly<{
      type: "hsl";
      hue: number;
      saturation: number;
      lightness: number;
    }>
  | Readonly<{ type: "ctl"; temperature: number; lightness: number }>;

export type LightPlan = Readonly<{
  command: LightCommand;
  /** Status to assume once the command is out. */
  optimistic: Readonly<Partial<DeviceStatus>>;
  /** Color mode the light switches to, if the command sets one. */
  colorMode: ColorMode | null;
}>;

// =============================================================================
// Entity State
// =============================================================================

export type LightState = Readonly<{
  uniqueId: string;
  name: string;
  kind: DeviceKind;
  model: string | null;
  available: boolean;
  isOn: boolean;
  /** 0 - 255 */
  brightness: number | null;
  /** [hue degrees, saturation percent] */
  hsColor: readonly [number, number] | null;
  /** Mireds */
  colorTemp: number | null;
  colorMode: ColorMode;
  supportedColorModes: readonly ColorMode[];
  minMireds: number;
  maxMireds: number;
}>;
