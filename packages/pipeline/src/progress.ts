/**
 * Progress reporting
 *
 * Observational only: the orchestrator never reads anything back from a
 * reporter.
 */

export interface ProgressEvent {
    phase: 'analysis' | 'validation';
    current: number;
    total: number;
    message: string;
}

export interface ProgressReporter {
    progress(event: ProgressEvent): void;
    /** An article failed a stage; reported as soon as it happens */
    failure(phase: ProgressEvent['phase'], index: number, error: string): void;
    /** An article was skipped at intake */
    skipped(index: number, reason: string): void;
}

const BAR_LENGTH = 40;

/**
 * `[████------] 50.0% (2/4) message`
 */
export function renderProgressBar(current: number, total: number, message = ''): string {
    const ratio = total > 0 ? Math.min(current / total, 1) : 0;
    const filled = Math.floor(BAR_LENGTH * ratio);
    const bar = '█'.repeat(filled) + '-'.repeat(BAR_LENGTH - filled);
    return `[${bar}] ${(ratio * 100).toFixed(1)}% (${current}/${total}) ${message}`.trimEnd();
}

/**
 * Logs through console with the `[Orchestrator]` tag.
 */
export class ConsoleProgressReporter implements ProgressReporter {
    progress({ current, total, message }: ProgressEvent): void {
        console.log(`[Orchestrator] ${renderProgressBar(current, total, message)}`);
    }

    failure(phase: ProgressEvent['phase'], index: number, error: string): void {
        const label = phase === 'analysis' ? '❌ Analysis' : '⚠️  Validation';
        console.error(`[Orchestrator] ${label} failed for article ${index}: ${error}`);
    }

    skipped(index: number, reason: string): void {
        console.warn(`[Orchestrator] ⚠️  Skipping article ${index}: ${reason}`);
    }
}

export const silentProgress: ProgressReporter = {
    progress: () => {},
    failure: () => {},
    skipped: () => {},
};
