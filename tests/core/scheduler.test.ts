import { PeriodicTask } from '../../src/core/scheduler';

describe('PeriodicTask', () => {
    beforeEach(() => {
        jest.useFakeTimers();
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.useRealTimers();
        jest.restoreAllMocks();
    });

    it('runs the task on every interval', async () => {
        const task = jest.fn().mockResolvedValue(undefined);
        const periodic = new PeriodicTask('tick', task, { intervalMs: 1000 });

        periodic.start();
        expect(periodic.isRunning()).toBe(true);
        expect(task).not.toHaveBeenCalled();

        await jest.advanceTimersByTimeAsync(1000);
        expect(task).toHaveBeenCalledTimes(1);

        await jest.advanceTimersByTimeAsync(3000);
        expect(task).toHaveBeenCalledTimes(4);

        periodic.stop();
    });

    it('never runs again after stop', async () => {
        const task = jest.fn().mockResolvedValue(undefined);
        const periodic = new PeriodicTask('tick', task, { intervalMs: 1000 });

        periodic.start();
        await jest.advanceTimersByTimeAsync(1000);
        periodic.stop();
        await jest.advanceTimersByTimeAsync(10000);

        expect(task).toHaveBeenCalledTimes(1);
        expect(periodic.isRunning()).toBe(false);
        expect(jest.getTimerCount()).toBe(0);
    });

    it('backs off exponentially on consecutive failures up to the cap', async () => {
        const task = jest.fn().mockRejectedValue(new Error('boom'));
        const periodic = new PeriodicTask('tick', task, { intervalMs: 1000, maxBackoffMs: 4000 });

        periodic.start();
        await jest.advanceTimersByTimeAsync(1000);    // t=1000, 1 failure, next in 2000
        expect(task).toHaveBeenCalledTimes(1);
        expect(periodic.nextDelay()).toBe(2000);

        await jest.advanceTimersByTimeAsync(1999);
        expect(task).toHaveBeenCalledTimes(1);
        await jest.advanceTimersByTimeAsync(1);       // t=3000, 2 failures, next in 4000
        expect(task).toHaveBeenCalledTimes(2);

        await jest.advanceTimersByTimeAsync(4000);    // t=7000, 3 failures, capped at 4000
        expect(task).toHaveBeenCalledTimes(3);
        expect(periodic.nextDelay()).toBe(4000);

        await jest.advanceTimersByTimeAsync(4000);
        expect(task).toHaveBeenCalledTimes(4);
        expect(periodic.getConsecutiveFailures()).toBe(4);
        expect(periodic.isRunning()).toBe(true);

        periodic.stop();
    });

    it('resets the delay after a success', async () => {
        const task = jest.fn()
            .mockRejectedValueOnce(new Error('boom'))
            .mockResolvedValue(undefined);
        const periodic = new PeriodicTask('tick', task, { intervalMs: 1000 });

        periodic.start();
        await jest.advanceTimersByTimeAsync(1000);    // fails
        await jest.advanceTimersByTimeAsync(2000);    // succeeds
        expect(task).toHaveBeenCalledTimes(2);
        expect(periodic.getConsecutiveFailures()).toBe(0);

        await jest.advanceTimersByTimeAsync(1000);
        expect(task).toHaveBeenCalledTimes(3);

        periodic.stop();
    });

    it('reports failures to the error hook and survives a throwing hook', async () => {
        const error = new Error('boom');
        const task = jest.fn().mockRejectedValue(error);
        const onError = jest.fn(() => {
            throw new Error('hook failed');
        });
        const periodic = new PeriodicTask('tick', task, { intervalMs: 1000, onError });

        periodic.start();
        await jest.advanceTimersByTimeAsync(1000);
        await jest.advanceTimersByTimeAsync(2000);

        expect(onError).toHaveBeenNthCalledWith(1, error, 1);
        expect(onError).toHaveBeenNthCalledWith(2, error, 2);

        periodic.stop();
    });

    it('waits for a run in progress', async () => {
        let finished = false;
        const periodic = new PeriodicTask('tick', async () => {
            await new Promise(resolve => setTimeout(resolve, 500));
            finished = true;
        }, { intervalMs: 1000 });

        periodic.start();
        await jest.advanceTimersByTimeAsync(1000);
        periodic.stop();

        const settled = periodic.settled();
        await jest.advanceTimersByTimeAsync(500);
        await settled;
        expect(finished).toBe(true);
    });
});
