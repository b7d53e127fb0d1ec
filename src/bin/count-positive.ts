#!/usr/bin/env node

import { CountPositiveConfig, resolveConfig, usage } from "../config/Config";
import { countPositiveInFile } from "../CountPositive";
import { DataFileError } from "../input/IntegerReader";
import { formatPositiveCount, OPEN_ERROR_MESSAGE } from "../report/Report";

export type ExitCode = 0 | 1;

export function main(argv: string[]): ExitCode
{
    let config: CountPositiveConfig;
    try {
        config = resolveConfig(argv);
    } catch (error) {
        console.error(error instanceof Error ? error.message : String(error));
        console.error(usage);
        return 1;
    }

    if (config.help) {
        console.log(usage);
        return 0;
    }

    try {
        const { count } = countPositiveInFile(config.dataFile);
        console.log(formatPositiveCount(count));
        return 0;
    } catch (error) {
        if (!(error instanceof DataFileError)) throw error;
        console.log(OPEN_ERROR_MESSAGE);
        return 1;
    }
}

if (require.main === module) {
    process.exitCode = main(process.argv.slice(2));
}
