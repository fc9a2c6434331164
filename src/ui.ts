/**
 * Terminal output helpers with consistent styling
 *
 * Progress goes to stdout; every warning, skip and error goes to stderr.
 */

import chalk from "chalk"

export const ui = {
	/** Section header with decorative border */
	header(text: string): void {
		console.log(chalk.cyan.bold(`\n═══ ${text} ═══\n`))
	},

	/** Success message with checkmark */
	success(text: string): void {
		console.log(chalk.green("✓") + " " + text)
	},

	/** Error message with X mark */
	error(text: string): void {
		console.error(chalk.red("✗") + " " + text)
	},

	/** Warning message */
	warn(text: string): void {
		console.error(chalk.yellow("⚠") + " " + text)
	},

	/** Info message */
	info(text: string): void {
		console.log(chalk.blue("ℹ") + " " + text)
	},

	/** Format a list of results for summary */
	summarySection(title: string, items: string[], color: "green" | "red"): void {
		if (items.length === 0) return
		const colorFn = color === "green" ? chalk.green : chalk.red
		const symbol = color === "green" ? "✓" : "✗"
		const write = color === "green" ? console.log : console.error
		write(colorFn(`${title} (${items.length}):`))
		for (const item of items) {
			write(`  ${symbol} ${item}`)
		}
	},

	/** Final status line */
	finalStatus(allSuccess: boolean): void {
		console.log()
		if (allSuccess) {
			console.log(chalk.green.bold("✓ All operations completed successfully!"))
		} else {
			console.error(
				chalk.yellow.bold("⚠ Some items failed. See above for details."),
			)
		}
	},
}
