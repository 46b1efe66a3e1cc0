export * as TOML from "smol-toml";
export * as YAML from "js-yaml";

export { default as pino } from "pino";
export { default as pinoPretty } from "pino-pretty";
