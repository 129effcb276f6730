import { afterEach, describe, expect, it, vi } from "vitest";
import { parseCliOptions } from "../cli";
import { CONFIG_ENV_VAR } from "../utils/resolveConfigPath";

const argv = (...args: string[]) => ["node", "downloads-organizer", ...args];

describe("parseCliOptions", () => {
	afterEach(() => {
		vi.unstubAllEnvs();
	});

	it("defaults every flag to off", () => {
		vi.stubEnv(CONFIG_ENV_VAR, "");
		expect(parseCliOptions(argv())).toEqual({
			folders: false,
			dryRun: false,
			config: "config.yaml",
			verbose: false,
			watch: false,
		});
	});

	it("reads the short and long flags", () => {
		expect(
			parseCliOptions(argv("-f", "--dry-run", "-v", "-c", "custom.yaml")),
		).toEqual({
			folders: true,
			dryRun: true,
			config: "custom.yaml",
			verbose: true,
			watch: false,
		});
	});

	it("takes the default config path from the environment", () => {
		vi.stubEnv(CONFIG_ENV_VAR, "/etc/organizer.yaml");
		expect(parseCliOptions(argv("--watch"))).toMatchObject({
			config: "/etc/organizer.yaml",
			watch: true,
		});
	});
});
