import fs from "node:fs/promises";
import chalk from "chalk";
import dotenv from "dotenv";
import { BlockState } from "./world/BlockState.ts";
import { type ChunkLocation, type ChunkOptions } from "./world/Chunk.ts";
import { set_debug_logging, warn } from "./utils/log.ts";

export type ConverterConfig = {
  default_state: BlockState;
  data_version: number;
  debug: boolean;
};

type Vars = { [key: string]: string | undefined };

let KNOWN_VARS = ["VOXPACK_DEFAULT_STATE", "VOXPACK_DATA_VERSION", "VOXPACK_DEBUG"];

let parse_boolean = (name: string, value: string) => {
  if (["1", "true", "yes"].includes(value.toLowerCase())) return true;
  if (["0", "false", "no", ""].includes(value.toLowerCase())) return false;
  throw new Error(`${name} must be a boolean, got "${value}"`);
};

export let parse_config = (vars: Vars): ConverterConfig => {
  for (let key of Object.keys(vars)) {
    if (key.startsWith("VOXPACK_") && !KNOWN_VARS.includes(key)) {
      warn("CONFIG", `Unknown variable ${chalk.yellow(key)}`);
    }
  }

  let data_version_string = vars.VOXPACK_DATA_VERSION ?? "2586";
  if (!/^\d+$/.test(data_version_string)) {
    throw new Error(`VOXPACK_DATA_VERSION must be a non-negative integer, got "${data_version_string}"`);
  }

  return {
    default_state: new BlockState(vars.VOXPACK_DEFAULT_STATE ?? "minecraft:air"),
    data_version: Number(data_version_string),
    debug: parse_boolean("VOXPACK_DEBUG", vars.VOXPACK_DEBUG ?? "false"),
  };
};

/// Reads the `.vars` file (dotenv syntax) if there is one, `env` wins over it
export let load_config = async ({
  path = ".vars",
  env = process.env,
}: { path?: string; env?: Vars } = {}): Promise<ConverterConfig> => {
  let vars: Vars = {};
  try {
    vars = dotenv.parse(await fs.readFile(path, "utf8"));
  } catch (error) {
    if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
      throw error;
    }
  }

  let config = parse_config({ ...vars, ...env });
  set_debug_logging(config.debug);
  return config;
};

export let chunk_options_from_config = (
  config: ConverterConfig,
  location: ChunkLocation
): ChunkOptions => {
  return {
    location,
    data_version: config.data_version,
    default_state: config.default_state,
  };
};
