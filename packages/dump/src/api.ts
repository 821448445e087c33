import { defaultConfig, simpleConfig } from "./config";
import { Dumper } from "./dumper";
import type { Writer } from "./dumper";

const noColors = { ...defaultConfig, useColors: false };

// Prints to stdout with types, hints and colors.
export function dump(...values: unknown[]) {
  new Dumper(defaultConfig).dump(...values);
}

export function dumpNoColors(...values: unknown[]) {
  new Dumper(noColors).dump(...values);
}

// Values only, without types or hints.
export function dumpValues(...values: unknown[]) {
  new Dumper(simpleConfig).dump(...values);
}

export function fdump(writer: Writer, ...values: unknown[]) {
  new Dumper(defaultConfig).fdump(writer, ...values);
}

export function fdumpNoColors(writer: Writer, ...values: unknown[]) {
  new Dumper(noColors).fdump(writer, ...values);
}

export function fdumpValues(writer: Writer, ...values: unknown[]) {
  new Dumper(simpleConfig).fdump(writer, ...values);
}

export function sdump(...values: unknown[]): string {
  return new Dumper(defaultConfig).sdump(...values);
}

export function sdumpNoColors(...values: unknown[]): string {
  return new Dumper(noColors).sdump(...values);
}

export function sdumpValues(...values: unknown[]): string {
  return new Dumper(simpleConfig).sdump(...values);
}

export function sdumpHTML(...values: unknown[]): string {
  return new Dumper(defaultConfig).sdumpHTML(...values);
}

export function sdumpHTMLValues(...values: unknown[]): string {
  return new Dumper(simpleConfig).sdumpHTML(...values);
}

// Prints the values and exits the process with status 1.
export function die(...values: unknown[]): never {
  return new Dumper(defaultConfig).die(...values);
}
