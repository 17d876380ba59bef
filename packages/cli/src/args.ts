import { parseArgs } from "node:util";
import { APP_NAME } from "@fuzzpick/utils";

export const HELP = `Usage: ${APP_NAME} [options] [candidates...]

Pick one or more of the given candidates with fuzzy search.

Keys:
  type to filter       Backspace erases
  Up / Ctrl-P          move to a worse match
  Down / Ctrl-N        move to a better match
  Tab                  toggle selection
  Enter                confirm

Options:
  --stderr             draw the picker on stderr (keeps stdout for the result)
  -h, --help           show this help
  -v, --version        print the version
`;

export interface CliArgs {
	candidates: string[];
	stderr: boolean;
	help: boolean;
	version: boolean;
}

export function parseCliArgs(argv: string[]): CliArgs {
	const { values, positionals } = parseArgs({
		args: argv,
		allowPositionals: true,
		strict: true,
		options: {
			stderr: { type: "boolean", default: false },
			help: { type: "boolean", short: "h", default: false },
			version: { type: "boolean", short: "v", default: false },
		},
	});
	return {
		candidates: positionals,
		stderr: values.stderr ?? false,
		help: values.help ?? false,
		version: values.version ?? false,
	};
}
