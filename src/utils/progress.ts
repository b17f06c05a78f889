import cliProgress from 'cli-progress';
import type { Stats } from '../types.js';
import { PROGRESS_FLUSH_INTERVAL_MS, SPEED_UPDATE_INTERVAL_MS } from '../constants.js';

const FORMAT =
    '📦 Export |{bar}| {percentage}% | {value}/{total} docs | ' +
    '{partitionsDone}/{partitions} partitions | {speed} docs/s | ETA: {eta}s';

/**
 * Export progress over documents, with partitions finished and docs/s in the payload.
 *
 * Workers add to a pending count that a timer flushes, so concurrent
 * partitions do not redraw the bar on every page.
 */
export class ProgressBarWrapper {
    private bar: cliProgress.SingleBar | null = null;
    private timers: NodeJS.Timeout[] = [];
    private pending = 0;
    private partitionsDone = 0;
    private lastDocuments = 0;
    private lastTime = Date.now();

    /**
     * @param total documents planned across the selected partitions
     * @param stats read for documentsExported when computing the speed
     */
    start(total: number, partitions: number, stats: Stats): void {
        if (total <= 0) return;

        this.bar = new cliProgress.SingleBar({
            format: FORMAT,
            barCompleteChar: '█',
            barIncompleteChar: '░',
            hideCursor: true,
        });
        this.bar.start(total, 0, { speed: '0', partitionsDone: 0, partitions });
        this.pending = 0;
        this.partitionsDone = 0;
        this.lastDocuments = 0;
        this.lastTime = Date.now();

        this.timers = [
            setInterval(() => this.updateSpeed(stats), SPEED_UPDATE_INTERVAL_MS),
            setInterval(() => this.flush(), PROGRESS_FLUSH_INTERVAL_MS),
        ];
    }

    incrementBy(count: number): void {
        if (this.bar && count > 0) {
            this.pending += count;
        }
    }

    partitionFinished(): void {
        if (this.bar) {
            this.partitionsDone++;
            this.bar.update({ partitionsDone: this.partitionsDone });
        }
    }

    private flush(): void {
        if (!this.bar || this.pending === 0) return;

        const count = this.pending;
        this.pending = 0;
        this.bar.increment(count);
    }

    private updateSpeed(stats: Stats): void {
        if (!this.bar) return;

        const now = Date.now();
        const seconds = (now - this.lastTime) / 1000;
        if (seconds <= 0) return;

        const speed = Math.round((stats.documentsExported - this.lastDocuments) / seconds);
        this.lastDocuments = stats.documentsExported;
        this.lastTime = now;
        this.bar.update({ speed: String(speed) });
    }

    /** Flush what is pending, then clear the timers and the bar */
    stop(): void {
        this.flush();

        for (const timer of this.timers) {
            clearInterval(timer);
        }
        this.timers = [];

        this.bar?.stop();
        this.bar = null;
    }

    get isActive(): boolean {
        return this.bar !== null;
    }
}
