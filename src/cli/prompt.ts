import * as readline from "node:readline/promises";

/** Asks the user to confirm a destructive action. */
export interface Prompt {
	/** Resolves `false` unless the user answers with something starting with y. */
	confirm(args: { message: string }): Promise<boolean>;
}

/** `y`/`Y` confirms; anything else, an empty answer or EOF declines. */
export const isConfirmation = (answer: string | null): boolean => {
	return answer?.trim().toLowerCase().startsWith("y") ?? false;
};

/** {@link Prompt} reading one line from stdin per question. */
export const createReadlinePrompt = (): Prompt => {
	return {
		async confirm({ message }) {
			const rl = readline.createInterface({
				input: process.stdin,
				output: process.stdout,
			});

			// Closing stdin before an answer arrives counts as "no".
			const closed = new Promise<null>((resolve) => {
				rl.once("close", () => resolve(null));
			});
			const asked = rl
				.question(`${message} [y/N]: `)
				.catch((): null => null);

			try {
				const answer = await Promise.race([asked, closed]);
				return isConfirmation(answer);
			} finally {
				rl.close();
			}
		},
	};
};
