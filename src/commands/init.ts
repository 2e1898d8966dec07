import { access } from "node:fs/promises";
import { defaultConfig, resolveConfigPath, writeConfig } from "../core/config.js";

export interface InitOptions {
  configPath?: string;
  force?: boolean;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * `wordpass init` — write a config file with every default spelled out.
 * Returns the path written.
 */
export async function runInit(options: InitOptions = {}): Promise<string> {
  const configPath = resolveConfigPath(options.configPath);
  if (!options.force && (await exists(configPath))) {
    throw new Error(`Config already exists at ${configPath} (use --force to overwrite).`);
  }
  await writeConfig(configPath, defaultConfig());
  process.stdout.write(`Wrote ${configPath}\n`);
  return configPath;
}
