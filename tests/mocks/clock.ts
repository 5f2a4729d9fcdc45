/**
 * Manually advanced clock for time-dependent logic
 */
export class FakeClock {
    constructor(public current: number = 1_000_000) {}

    now = (): number => this.current;

    advance(ms: number): number {
        this.current += ms;
        return this.current;
    }
}
