import type { ISystemClock } from '../../kernel-core/L0/Ports.js';

/** Wall-clock seconds, never moving backwards. */
export class SystemClock implements ISystemClock {
    private last = 0;

    now(): number {
        this.last = Math.max(this.last, Math.floor(Date.now() / 1000));
        return this.last;
    }
}

/** Clock driven by hand, for tests and replays. */
export class ManualClock implements ISystemClock {
    constructor(private current: number = 0) { }

    now(): number {
        return this.current;
    }

    set(seconds: number): void {
        if (seconds < this.current) throw new Error(`Clock cannot move back from ${this.current} to ${seconds}`);
        this.current = seconds;
    }

    advance(seconds: number): number {
        this.set(this.current + seconds);
        return this.current;
    }
}
