import dotenv from "dotenv";
import { DEFAULT_CONFIG_PATH } from "../config";

export const CONFIG_ENV_VAR = "DOWNLOADS_ORGANIZER_CONFIG";

/**
 * Resolves the default configuration path from environment variables or .env file
 * Prioritizes environment variables over .env file, then falls back to config.yaml
 */
export function resolveConfigPath(): string {
	// First check if the path is already in environment (e.g., from shell config)
	const fromEnv = process.env[CONFIG_ENV_VAR];
	if (fromEnv) {
		return fromEnv;
	}

	// If not found in environment, try to load from .env file
	dotenv.config();

	return process.env[CONFIG_ENV_VAR] || DEFAULT_CONFIG_PATH;
}
