/**
 * Mid-level IR model and its debug dump
 *
 * The model describes what the dumper reads; `Builder` assembles graphs for
 * tests and tools, and `Analysis` holds the formatter and validator.
 */

export * from "./spec/index.js";
export { Builder } from "./builder.js";
export * as Analysis from "./analysis/index.js";
