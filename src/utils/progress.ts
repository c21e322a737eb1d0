import cliProgress from 'cli-progress';
import chalk from 'chalk';

export type BarPayload = Record<string, string>;

/**
 * The parts of a cli-progress bar this module drives.
 */
export interface ProgressBar {
    update(value: number, payload?: BarPayload): void;
    setTotal(total: number): void;
    getTotal(): number;
}

export interface ProgressBarSet {
    create(total: number, start: number, payload?: BarPayload, options?: { format: string }): ProgressBar;
    stop(): void;
}

export interface IngestionProgressOptions {
    bars?: ProgressBarSet;
    now?: () => number;
}

const FILE_FORMAT = ` ${chalk.blue('{status}')} {bar} | {percentage}% | {value}/{total} variants | {rate} | ${chalk.gray('{variant}')}`;

interface ActiveFile {
    bar: ProgressBar;
    title: string;
    startedAt: number;
    processed: number;
}

function createMultiBar(): ProgressBarSet {
    return new cliProgress.MultiBar({
        clearOnComplete: false,
        hideCursor: true,
        barCompleteChar: '█',
        barIncompleteChar: '░',
    }, cliProgress.Presets.shades_grey);
}

/**
 * One bar per patient file, advanced by the enrichment `progress` events.
 */
export class IngestionProgress {
    private readonly bars: ProgressBarSet;
    private readonly now: () => number;
    private current: ActiveFile | null = null;

    constructor(options: IngestionProgressOptions = {}) {
        this.bars = options.bars ?? createMultiBar();
        this.now = options.now ?? Date.now;
    }

    startFile(patientName: string, total: number): void {
        const title = `Enriching ${patientName}`;
        const bar = this.bars.create(
            Math.max(total, 1),
            0,
            { status: title, rate: '0.0/s', variant: '' },
            { format: FILE_FORMAT }
        );
        this.current = { bar, title, startedAt: this.now(), processed: 0 };
    }

    update(processed: number, total: number, vcfForm: string): void {
        if (!this.current) return;
        this.current.processed = processed;
        this.current.bar.setTotal(Math.max(total, 1));
        this.current.bar.update(processed, {
            status: this.current.title,
            rate: this.rate(processed),
            variant: vcfForm,
        });
    }

    complete(message?: string): void {
        if (!this.current) return;
        const total = this.current.bar.getTotal();
        this.current.bar.update(total, {
            status: message ?? `${this.current.title} - Complete!`,
            rate: this.rate(total),
            variant: '',
        });
        this.current = null;
    }

    error(error: string): void {
        if (!this.current) return;
        this.current.bar.update(this.current.processed, {
            status: chalk.red(`${this.current.title} - Failed: ${error}`),
            rate: '0.0/s',
            variant: '',
        });
        this.current = null;
    }

    stop(): void {
        this.bars.stop();
    }

    private rate(value: number): string {
        if (!this.current) return '0.0/s';
        const elapsed = Math.max((this.now() - this.current.startedAt) / 1000, 0.001);
        return `${(value / elapsed).toFixed(1)}/s`;
    }
}
