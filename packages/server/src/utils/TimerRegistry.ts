/**
 * Centralized timer management for proper cleanup during shutdown.
 * Tracks setTimeout handles by ID so a component can re-arm or cancel
 * its timers, and shutdown can dispose of everything at once.
 */
export class TimerRegistry {
    private timeouts: Map<string, NodeJS.Timeout> = new Map();
    private idCounter = 0;

    private generateId(prefix: string): string {
        return `${prefix}-${++this.idCounter}`;
    }

    /**
     * Register a timeout with optional ID (auto-generated if not provided).
     * Registering an ID that is already pending replaces the earlier timeout.
     * @returns The ID used to identify this timeout
     */
    setTimeout(callback: () => void, delayMs: number, id?: string): string {
        const timerId = id ?? this.generateId('timeout');

        const existing = this.timeouts.get(timerId);
        if (existing) {
            clearTimeout(existing);
        }

        const handle = setTimeout(() => {
            this.timeouts.delete(timerId);
            callback();
        }, delayMs);

        this.timeouts.set(timerId, handle);
        return timerId;
    }

    /**
     * Clear a specific timeout by ID.
     * @returns true if the timeout was pending and is now cleared
     */
    clearTimeout(id: string): boolean {
        const handle = this.timeouts.get(id);
        if (handle) {
            clearTimeout(handle);
            this.timeouts.delete(id);
            return true;
        }
        return false;
    }

    has(id: string): boolean {
        return this.timeouts.has(id);
    }

    /**
     * Clear all registered timers (for shutdown).
     * @returns Number of timeouts cleared
     */
    clear(): number {
        const cleared = this.timeouts.size;
        for (const handle of this.timeouts.values()) {
            clearTimeout(handle);
        }
        this.timeouts.clear();
        return cleared;
    }

    getActiveCount(): number {
        return this.timeouts.size;
    }
}
