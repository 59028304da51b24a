import { formatPercent, printInfo, printStatistics } from '../Helper';
import { SeededRandom } from '../Random';
import Simulator from '../Simulator';
import { DEFAULT_CONFIG } from '../Config';

describe('Helper', () => {
    let logSpy: jest.SpyInstance;

    beforeEach(() => {
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        logSpy.mockRestore();
    });

    it('should format rates as percentages with two decimals', () => {
        expect(formatPercent(1 / 3)).toBe('33.33%');
        expect(formatPercent(1)).toBe('100%');
        expect(formatPercent(0)).toBe('0%');
    });

    it('should only log info when enabled', () => {
        printInfo(false, 'hidden');
        printInfo(true, 'shown');

        expect(logSpy).toHaveBeenCalledTimes(1);
        expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('shown'));
    });

    it('should print fork and group tables, plus miners when verbose', () => {
        const config = { ...DEFAULT_CONFIG, rounds: 20, seed: 3 };
        const result = new Simulator(config, new SeededRandom(3)).simulate();

        printStatistics(result, false);
        const quietCalls = logSpy.mock.calls.length;
        logSpy.mockClear();
        printStatistics(result, true);

        // fork title + table, group title + table
        expect(quietCalls).toBe(4);
        expect(logSpy.mock.calls.length).toBe(4 + 2 + result.forks.forkCount);
    });
});
