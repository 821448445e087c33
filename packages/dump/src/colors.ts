// A color as both a 256-color terminal escape and the closest HTML hex value.
export interface Color {
  readonly ansi: string;
  readonly html: string;
}

function color(code: number, html: string): Color {
  return Object.freeze({ ansi: `\x1b[38;5;${code}m`, html });
}

export const RESET = "\x1b[0m";

export const palette = Object.freeze({
  slateGray: color(245, "#A0A8B3"),
  dimGray: color(240, "#5F6368"),
  darkGray: color(238, "#444444"),
  lime: color(113, "#80ff80"),
  skyBlue: color(117, "#55C1E7"),
  lightTeal: color(73, "#46A4B0"),
  darkTeal: color(30, "#005F5F"),
  darkBlue: color(24, "#005F87"),
  green: color(34, "#00af00"),
  goldenrod: color(220, "#FFD54F"),
  coralRed: color(203, "#F46C5E"),
  violet: color(135, "#af5fff"),
  pink: color(218, "#ffafd7"),
  mutedBlue: color(110, "#73B3D5"),
  brightBlue: color(33, "#00ADD8"),
});

// What each part of the output is drawn in.
export const theme = Object.freeze({
  type: palette.darkGray,
  meta: palette.dimGray,
  notice: palette.slateGray,
  index: palette.darkTeal,
  fieldMarker: palette.darkBlue,
  fieldName: palette.lightTeal,
  quote: palette.goldenrod,
  string: palette.lime,
  number: palette.skyBlue,
  true: palette.green,
  false: palette.coralRed,
  nil: palette.coralRed,
  other: palette.violet,
  func: palette.lightTeal,
  id: palette.goldenrod,
  backref: palette.pink,
  error: palette.coralRed,
  methodMarker: palette.darkTeal,
  method: palette.mutedBlue,
  hexOffset: palette.darkTeal,
  hexBytes: palette.skyBlue,
  hexText: palette.lime,
  header: palette.brightBlue,
});
