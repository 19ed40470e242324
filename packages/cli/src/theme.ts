import chalk, { type ChalkInstance } from 'chalk';

// ---------------------------------------------------------------------------
// Terminal palette: bold for emphasis, dim for labels.
// Color only for semantic meaning — green, amber, red.
// ---------------------------------------------------------------------------

export const bold: ChalkInstance = chalk.bold;
export const dim: ChalkInstance = chalk.dim;
export const success: ChalkInstance = chalk.hex('#22c55e');
export const warn: ChalkInstance = chalk.hex('#f59e0b');
export const danger: ChalkInstance = chalk.hex('#ef4444');

export function successMark(text: string): string {
	return `${success('✓')} ${text}`;
}

export function warnMark(text: string): string {
	return `${warn('!')} ${text}`;
}

export function failMark(text: string): string {
	return `${danger('✕')} ${text}`;
}

/** Prints `label value` rows with labels padded to a common width. */
export function printRows(rows: ReadonlyArray<readonly [string, string]>): void {
	const width = Math.max(...rows.map(([label]) => label.length));
	for (const [label, value] of rows) {
		console.log(`  ${dim(label.padEnd(width))}  ${value}`);
	}
}
