import fs from "fs";

export class DataFileError extends Error {
    readonly path: string;

    constructor(path: string, cause: unknown) {
        super(`Cannot open data file: ${path}`, { cause });
        this.name = "DataFileError";
        this.path = path;
    }
}

//ascii whitespace, optional sign, digits; anchored at lastIndex
const INTEGER_TOKEN = /[ \t\n\v\f\r]*([+-]?\d+)/y;

/**
 * Yields whitespace separated integers from `text` in order.
 *
 * Stops at end of input or at the first spot where no integer can be read
 * ("abc", a lone "-", the ".5" left over after "1"). Only ASCII whitespace
 * separates values, so a BOM or a non-breaking space ends the sequence too,
 * as does a digit run too large for a safe integer.
 */
export function* parseIntegers(text: string): Generator<number> {
    const tokenizer = new RegExp(INTEGER_TOKEN);

    while (tokenizer.lastIndex < text.length) {
        const match = tokenizer.exec(text);
        if (match === null) return;

        //"-0" reads as plain 0
        const value = Number(match[1]) + 0;
        if (!Number.isSafeInteger(value)) return;

        yield value;
    }
}

/**
 * Opens `path` immediately and returns a lazy sequence of its integers.
 * Throws DataFileError if the file cannot be read; nothing is yielded in that case.
 */
export function readIntegers(path: string): Generator<number> {
    let text: string;
    try {
        text = fs.readFileSync(path, "utf-8");
    } catch (error) {
        throw new DataFileError(path, error);
    }

    return parseIntegers(text);
}
