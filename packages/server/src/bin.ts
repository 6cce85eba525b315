#!/usr/bin/env node

import { Logger } from "@switchyard/core";
import { type ConfigProvider, FileConfigProvider, StaticConfigProvider } from "@switchyard/orchestrator";
import { loadServerConfig } from "./config";
import { SwitchyardServer } from "./server";

async function main(): Promise<number> {
	const settings = loadServerConfig();
	if (!settings.ok) {
		process.stderr.write(`Error: ${settings.error.message}\n`);
		return 1;
	}
	const { configPath, environment, logLevel, port, host, requestTimeoutMs } = settings.value;
	const logger = new Logger(logLevel, { service: "switchyard" });

	let config: ConfigProvider = new StaticConfigProvider({ environment });
	let fileConfig: FileConfigProvider | undefined;
	if (configPath) {
		const opened = await FileConfigProvider.open(configPath, environment);
		if (!opened.ok) {
			logger.error("cannot load config", { path: configPath, error: opened.error });
			return 1;
		}
		fileConfig = opened.value;
		config = fileConfig;
	}

	const server = new SwitchyardServer({ port, host, config, logger, requestTimeoutMs });
	const started = await server.start();
	if (!started.ok) return 1;

	if (fileConfig) {
		const reloadable = fileConfig;
		process.on("SIGHUP", () => {
			reloadable
				.reload()
				.then((reloaded) => {
					if (!reloaded.ok) {
						logger.warn("config reload failed", { error: reloaded.error });
					} else if (reloaded.value) {
						server.orchestrator.clearCache();
						logger.info("config reloaded", { path: reloadable.path });
					}
				})
				.catch((err: unknown) => logger.error("config reload crashed", { error: err }));
		});
	}

	const shutdown = () => {
		server
			.stop()
			.then(() => process.exit(0))
			.catch((err: unknown) => {
				logger.error("shutdown failed", { error: err });
				process.exit(1);
			});
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);
	return 0;
}

main()
	.then((code) => {
		if (code !== 0) process.exit(code);
	})
	.catch((err: unknown) => {
		process.stderr.write(`Error: ${String(err)}\n`);
		process.exit(1);
	});
