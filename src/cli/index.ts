export { CommanderCli, overridesFromOptions } from "./CommanderCli";
