import { formatPositiveCount, OPEN_ERROR_MESSAGE } from "./Report";

describe('Report', () => {
    test('formatPositiveCount', () => {
        expect(formatPositiveCount(2)).toBe("The number of positive elements is 2.");
        expect(formatPositiveCount(0)).toBe("The number of positive elements is 0.");
        expect(formatPositiveCount(1024)).toBe("The number of positive elements is 1024.");
    });

    test('open error message', () => {
        expect(OPEN_ERROR_MESSAGE).toBe("Error: cannot open data file");
    });
});
