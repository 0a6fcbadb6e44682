import { loadConfig, type Config } from "@warmstart/config";

export const config = loadConfig();
export type { Config };
