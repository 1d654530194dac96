import type { BuildTrackingConfig } from '@core/config/gallery-config';

import { BuildStatusPoller, type PagesStatusSource } from './build-status.poller';

/** Keeps at most one build poller per repository. */
export class BuildTracker {
    private readonly pollers = new Map<string, BuildStatusPoller>();

    constructor(
        private readonly options: BuildTrackingConfig,
        private readonly source: PagesStatusSource,
    ) { }

    get(repository: string): BuildStatusPoller | null {
        return this.pollers.get(repository) ?? null;
    }

    activeRepositories(): string[] {
        return [...this.pollers.keys()];
    }

    /**
     * Starts tracking a new build. Any poller already running for the repository is cancelled and
     * joined before the new one makes its first request.
     */
    async track(repository: string): Promise<BuildStatusPoller> {
        const previous = this.pollers.get(repository);
        const poller = new BuildStatusPoller(repository, this.options, this.source);
        this.pollers.set(repository, poller);
        poller.events$.subscribe({
            complete: () => {
                if (this.pollers.get(repository) === poller) {
                    this.pollers.delete(repository);
                }
            },
        });

        if (previous) {
            console.debug(`BuildTracker: replacing the running poller for ${repository}`);
            await previous.cancelAndJoin();
        }

        // A later call may have superseded this one while the previous poller wound down.
        if (this.pollers.get(repository) === poller) {
            poller.start();
        }
        return poller;
    }

    cancel(repository: string): Promise<void> {
        const poller = this.pollers.get(repository);
        return poller ? poller.cancelAndJoin().then(() => undefined) : Promise.resolve();
    }

    async cancelAll(): Promise<void> {
        await Promise.all([...this.pollers.values()].map(poller => poller.cancelAndJoin()));
        this.pollers.clear();
    }
}
