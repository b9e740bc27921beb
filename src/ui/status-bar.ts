import pc from "picocolors";

type Output = {
	write(chunk: string): boolean;
	isTTY?: boolean;
	columns?: number;
};

type Task = {
	label: string;
	total: number;
	completed: number;
	failed: number;
};

export class StatusBar {
	private task: Task | undefined;

	private frame = 0;
	private timer: ReturnType<typeof setInterval> | undefined;
	private spinners = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
	private lastRenderLines = 0;

	constructor(private readonly output: Output = process.stderr) {}

	get isActive(): boolean {
		return this.task !== undefined;
	}

	/** Starts a progress line for `total` units of work. Only animates on a TTY. */
	start(label: string, total: number) {
		this.task = { label, total, completed: 0, failed: 0 };
		if (this.output.isTTY && !this.timer) {
			this.timer = setInterval(() => {
				this.render();
			}, 80);
			this.timer.unref?.();
		}
		this.render();
	}

	advance(outcome: "ok" | "failed" = "ok") {
		if (!this.task) return;
		this.task.completed++;
		if (outcome === "failed") this.task.failed++;
		this.render();
	}

	stop() {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = undefined;
		}
		this.clearRenderedBlock();
		this.task = undefined;
	}

	log(msg: string) {
		this.clearRenderedBlock();
		this.output.write(msg);
		if (!msg.endsWith("\n")) {
			this.output.write("\n");
		}
		this.render();
	}

	private clearRenderedBlock() {
		if (!this.output.isTTY || this.lastRenderLines === 0) return;
		if (this.lastRenderLines > 1) {
			this.output.write(`\x1b[${this.lastRenderLines - 1}A`);
		}
		this.output.write("\r\x1b[J");
		this.lastRenderLines = 0;
	}

	private render() {
		if (!this.task || !this.output.isTTY) return;

		this.frame++;
		const spinner = pc.cyan(this.spinners[this.frame % this.spinners.length]);
		const cols = this.output.columns || 80;
		const { label, total, completed, failed } = this.task;

		const counts = `${pc.dim("(")}${pc.green(String(completed))}${pc.dim("/")}${pc.dim(String(total))}${pc.dim(")")}`;
		const failures = failed > 0 ? ` ${pc.red(String(failed))} ${pc.dim("failed")}` : "";
		const line = this.truncateToCols(
			`${spinner} ${pc.cyan(label)} ${this.renderBar(completed, total)} ${counts}${failures}`,
			cols,
		);

		this.clearRenderedBlock();
		this.output.write(line);
		this.lastRenderLines = 1;
	}

	private renderBar(completed: number, total: number, width = 20): string {
		const ratio = total > 0 ? Math.min(1, completed / total) : 0;
		const filled = Math.round(ratio * width);
		return `${pc.green("█".repeat(filled))}${pc.dim("░".repeat(width - filled))}`;
	}

	private truncateToCols(str: string, cols: number): string {
		const visible = stripAnsi(str);
		if (visible.length <= cols) return str;
		return str.slice(0, Math.max(0, cols - 1));
	}
}

export function stripAnsi(str: string): string {
	return str.replace(
		// biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escape codes
		/[\u001b\u009b][[()#;?]*(?:[0-9]{1,4}(?:;[0-9]{0,4})*)?[0-9A-ORZcf-nqry=><]/g,
		"",
	);
}

export const statusBar = new StatusBar();
