import { QueueClosedError, SerialQueue } from '../../src/core/serial_queue';
import { delay } from '../../src/utils/helpers';

function nextTurn(): Promise<void> {
    return new Promise(resolve => setImmediate(resolve));
}

describe('SerialQueue', () => {
    it('runs tasks one at a time in submission order', async () => {
        const queue = new SerialQueue('test');
        const order: string[] = [];

        const results = await Promise.all([
            queue.run(async () => {
                order.push('a:start');
                await delay(20);
                order.push('a:end');
                return 'a';
            }),
            queue.run(async () => {
                order.push('b:start');
                await delay(5);
                order.push('b:end');
                return 'b';
            }),
            queue.run(() => {
                order.push('c');
                return 'c';
            }),
        ]);

        expect(results).toEqual(['a', 'b', 'c']);
        expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c']);
        expect(queue.stats().peakConcurrency).toBe(1);
    });

    it('keeps running after a task fails', async () => {
        const queue = new SerialQueue('test');
        const failing = queue.run(async () => {
            throw new Error('boom');
        });
        const next = queue.run(async () => 42);

        await expect(failing).rejects.toThrow('boom');
        await expect(next).resolves.toBe(42);
    });

    it('rejects new tasks once closed', async () => {
        const queue = new SerialQueue('test');
        queue.close();

        expect(queue.isClosed()).toBe(true);
        await expect(queue.run(async () => 1)).rejects.toBeInstanceOf(QueueClosedError);
    });

    it('lets the running task finish and skips queued ones on close', async () => {
        const queue = new SerialQueue('test');
        let release: () => void = () => undefined;
        const gate = new Promise<void>(resolve => {
            release = resolve;
        });
        const skipped = jest.fn();

        const running = queue.run(async () => {
            await gate;
            return 'done';
        });
        await nextTurn();
        const queued = queue.run(skipped);
        queue.close();
        release();

        await expect(running).resolves.toBe('done');
        await expect(queued).rejects.toBeInstanceOf(QueueClosedError);
        expect(skipped).not.toHaveBeenCalled();
    });

    it('reports idle once every task has settled', async () => {
        const queue = new SerialQueue('test');
        let finished = false;
        queue.run(async () => {
            await delay(10);
            finished = true;
        }).catch(() => undefined);

        expect(queue.stats().pending).toBe(1);
        await queue.onIdle();
        expect(finished).toBe(true);
        expect(queue.stats()).toEqual({ pending: 0, running: 0, peakConcurrency: 1 });
    });
});
