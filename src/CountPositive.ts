import { readIntegers } from "./input/IntegerReader";
import { SortedLinkedList } from "./list/SortedLinkedList";

export { SortedLinkedList, Node } from "./list/SortedLinkedList";
export { DataFileError, parseIntegers, readIntegers } from "./input/IntegerReader";
export { formatPositiveCount } from "./report/Report";

export interface CountPositiveResult {
    count: number;
    size: number;
}

//throws DataFileError before any list work if the file cannot be opened
export function countPositiveInFile(path: string): CountPositiveResult
{
    const values = readIntegers(path);
    const list = SortedLinkedList.from(values);

    return {
        count: list.countPositive(),
        size: list.size,
    };
}
