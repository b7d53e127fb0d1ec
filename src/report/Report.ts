export const OPEN_ERROR_MESSAGE = "Error: cannot open data file";

export function formatPositiveCount(count: number): string
{
    return `The number of positive elements is ${count}.`;
}
