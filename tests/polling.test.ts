/**
 * Polling loop tests
 */

import { startPolling } from '../src/index';

describe('startPolling', () => {
    it('should run cycles back to back until one fails', async () => {
        let calls = 0;
        let running = false;
        const cycle = jest.fn(async () => {
            expect(running).toBe(false);
            running = true;
            calls++;
            await new Promise((resolve) => setTimeout(resolve, 1));
            running = false;
            if (calls === 3) throw new Error('stop');
        });

        await expect(startPolling(cycle, 0)).rejects.toThrow('stop');
        expect(cycle).toHaveBeenCalledTimes(3);
    });
});
