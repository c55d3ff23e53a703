import { color } from '../utils.js';

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'] as const;

export function spinnerFrame(tick: number): string {
	return FRAMES[tick % FRAMES.length] ?? FRAMES[0];
}

/**
 * Animates `message` on stderr while `work` runs. Off a TTY the work just runs.
 * `describe` may replace the message once the result is known, e.g. with a count.
 */
export async function withSpinner<T>(
	message: string,
	colorsEnabled: boolean,
	work: () => Promise<T>,
	describe?: (result: T) => string,
): Promise<T> {
	const stream = process.stderr;
	if (!stream.isTTY) {
		return work();
	}

	let tick = 0;
	const render = (): void => {
		stream.write(`\r${color(spinnerFrame(tick), '36', colorsEnabled)} ${message}`);
		tick += 1;
	};

	render();
	const timer = setInterval(render, 80);

	try {
		const result = await work();
		clearInterval(timer);
		const done = describe == null ? message : describe(result);
		stream.write(`\r\x1b[2K${color('✔', '32', colorsEnabled)} ${done}\n`);
		return result;
	} catch (error) {
		clearInterval(timer);
		stream.write(`\r\x1b[2K${color('✖', '31', colorsEnabled)} ${message}\n`);
		throw error;
	}
}
