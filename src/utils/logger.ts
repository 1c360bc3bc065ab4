import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

const isLogLevel = (value: string | undefined): value is LogLevel =>
	LOG_LEVELS.some((level) => level === value);

let threshold: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';

const enabled = (level: Exclude<LogLevel, 'silent'>): boolean =>
	LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);

export const logger = {
	setLevel: (level: LogLevel): void => {
		threshold = level;
	},

	log: (message: string, ...args: unknown[]) => {
		if (enabled('info'))
			console.log(chalk.blue('ℹ'), message, ...args);
	},

	success: (message: string, ...args: unknown[]) => {
		if (enabled('info'))
			console.log(chalk.green('✓'), message, ...args);
	},

	warn: (message: string, ...args: unknown[]) => {
		if (enabled('warn'))
			console.warn(chalk.yellow('⚠'), message, ...args);
	},

	error: (message: string, ...args: unknown[]) => {
		if (enabled('error'))
			console.error(chalk.red('✗'), message, ...args);
	},

	info: (message: string, ...args: unknown[]) => {
		if (enabled('info'))
			console.log(chalk.cyan('→'), message, ...args);
	},

	debug: (message: string, ...args: unknown[]) => {
		if (enabled('debug'))
			console.log(chalk.gray('◆'), message, ...args);
	},

	title: (message: string) => {
		if (!enabled('info')) return;
		console.log(chalk.bold.cyan('\n' + '='.repeat(50)));
		console.log(chalk.bold.cyan(message));
		console.log(chalk.bold.cyan('='.repeat(50) + '\n'));
	}
};
