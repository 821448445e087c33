export interface DumperConfig {
  // Spaces per nesting level.
  indentWidth: number;
  // Deepest nesting level that is still expanded.
  maxDepth: number;
  // Elements or entries shown per list or map.
  maxItems: number;
  // Characters shown per string before it is cut off.
  maxStringLen: number;
  // Widest a collection or struct may be to fit on one line.
  maxInlineLength: number;
  showTypes: boolean;
  useColors: boolean;
  // Label shared and cyclic values instead of expanding them each time.
  trackReferences: boolean;
  // Hints such as string lengths and collection sizes.
  showMetaInformation: boolean;
  // Tag wrapped around each colored token in HTML output.
  htmlTagToken: string;
  // Tag wrapped around the whole of an HTML dump.
  htmlTagSection: string;
  // List the methods of objects below their fields.
  embedTypeMethods: boolean;
  // Byte arrays and Buffers as hex and text columns.
  showHexdump: boolean;
  // Expand errors and objects with their own toString instead of showing
  // their text.
  ignoreStringer: boolean;
  // Start each dump with a line naming the call it came from.
  showHeader: boolean;
}

export const defaultConfig: Readonly<DumperConfig> = Object.freeze({
  indentWidth: 3,
  maxDepth: 15,
  maxItems: 150,
  maxStringLen: 10000,
  maxInlineLength: 80,
  showTypes: true,
  useColors: true,
  trackReferences: true,
  showMetaInformation: true,
  htmlTagToken: "span",
  htmlTagSection: "pre",
  embedTypeMethods: true,
  showHexdump: true,
  ignoreStringer: false,
  showHeader: false,
});

// Values only, for compact output.
export const simpleConfig: Readonly<DumperConfig> = Object.freeze({
  ...defaultConfig,
  showTypes: false,
  showMetaInformation: false,
  embedTypeMethods: false,
});

const limits = [
  "indentWidth",
  "maxDepth",
  "maxItems",
  "maxStringLen",
  "maxInlineLength",
] as const;

const switches = [
  "showTypes",
  "useColors",
  "trackReferences",
  "showMetaInformation",
  "embedTypeMethods",
  "showHexdump",
  "ignoreStringer",
  "showHeader",
] as const;

const tags = ["htmlTagToken", "htmlTagSection"] as const;

const TAG_NAME = /^[A-Za-z][A-Za-z0-9-]*$/;

export function resolveConfig(
  overrides: Partial<DumperConfig> = {},
  base: Readonly<DumperConfig> = defaultConfig,
): DumperConfig {
  const config: DumperConfig = { ...base, ...overrides };

  limits.forEach(name => {
    const value: unknown = config[name];
    if (typeof value !== "number" || !Number.isInteger(value)) {
      throw new TypeError(`${name} must be an integer: ${String(value)}`);
    }
    if (value < 0) {
      throw new RangeError(`${name} must not be negative: ${value}`);
    }
  });

  switches.forEach(name => {
    const value: unknown = config[name];
    if (typeof value !== "boolean") {
      throw new TypeError(`${name} must be a boolean: ${String(value)}`);
    }
  });

  tags.forEach(name => {
    const value: unknown = config[name];
    if (typeof value !== "string") {
      throw new TypeError(`${name} must be a string: ${String(value)}`);
    }
    if (!TAG_NAME.test(value)) {
      throw new RangeError(`${name} is not a tag name: ${value}`);
    }
  });

  return config;
}
