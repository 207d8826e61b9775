import chalk from "chalk";

let debugEnabled = false;

export function setDebug(enabled: boolean): void {
	debugEnabled = enabled;
}

export function debug(message: string): void {
	if (debugEnabled) {
		console.error(chalk.dim(`[calm] ${message}`));
	}
}
