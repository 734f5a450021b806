// CHANGE: Central export point for command-line configuration

export { parseCLIArgs } from "./cli.js";
