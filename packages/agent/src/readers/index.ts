export type { PowerReader } from "./types";
export { CpuPowerReader, type CpuPowerReaderOptions } from "./cpu";
export {
  NvidiaSmiPowerReader,
  parsePowerDraw,
  runCommand,
  type CommandRunner,
  type NvidiaSmiPowerReaderOptions
} from "./nvidiaSmi";
