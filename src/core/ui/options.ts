// src/core/ui/options.ts
import { vec4d } from "wgpu-matrix";
import type { Color } from "@/core/types/ui";

/** Names of the palette colors used when an element sets none. */
export interface PaletteNames {
  /** Static labels. */
  label: string;
  /** Dynamic strings. */
  dynamic: string;
  /** Buttons, per state. */
  active: string;
  inactive: string;
  hover: string;
  /** Bars and rings. */
  bar: string;
}

export interface InterfaceOptions {
  defaultFontSize: number;
  /**
   * Scale factor given to an image axis with no declared size, so that the
   * constrained axis decides the uniform scale.
   */
  unconstrainedScale: number;
  palette: PaletteNames;
  /** Outline color for outlines without the `colored` attribute. */
  outlineColor: Color;
  /** Time each `Interface.draw` with `timeSection`. */
  profile: boolean;
}

export const DEFAULT_INTERFACE_OPTIONS: InterfaceOptions = {
  defaultFontSize: 14,
  unconstrainedScale: 1000,
  palette: {
    label: "medium",
    dynamic: "bright",
    active: "active",
    inactive: "inactive",
    hover: "hover",
    bar: "active",
  },
  outlineColor: vec4d.fromValues(1, 1, 1, 0.5),
  profile: false,
};

/** Options as callers pass them: any subset, palette included. */
export type InterfaceOptionsInput = Partial<Omit<InterfaceOptions, "palette">> & {
  palette?: Partial<PaletteNames>;
};

/**
 * Merges partial options over the defaults. `palette` merges per name.
 */
export function resolveOptions(
  optsPartial?: InterfaceOptionsInput,
): InterfaceOptions {
  return {
    ...DEFAULT_INTERFACE_OPTIONS,
    ...optsPartial,
    palette: {
      ...DEFAULT_INTERFACE_OPTIONS.palette,
      ...optsPartial?.palette,
    },
  };
}
