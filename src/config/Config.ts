import { parseArgs } from "util";

export const DEFAULT_DATA_FILE = "data1.txt";

export interface CountPositiveConfig {
    dataFile: string;
    help: boolean;
}

export const usage = `Usage: count-positive [data file]
Description:
    Reads whitespace separated integers from the data file (default: ${DEFAULT_DATA_FILE}),
    keeps them in a sorted list and prints how many are greater than zero.
Options:
    -h, --help        Show this help message
`;

//throws on unknown options or extra positionals
export function resolveConfig(argv: string[]): CountPositiveConfig
{
    const { values, positionals } = parseArgs({
        options: {
            help: {
                type: "boolean",
                short: "h",
            },
        },
        allowPositionals: true,
        args: argv,
    });

    if (positionals.length > 1) throw new Error(`Expected at most one data file, got ${positionals.length}`);

    return {
        dataFile: positionals[0] ?? DEFAULT_DATA_FILE,
        help: values.help ?? false,
    };
}
