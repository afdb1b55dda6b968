/**
 * Restore run phases and the transitions between them.
 * Done and Failed are terminal.
 */
export enum RestorePhase {
    Probing = 'Probing',
    Reclaiming = 'Reclaiming',
    Dropping = 'Dropping',
    Restoring = 'Restoring',
    Finalizing = 'Finalizing',
    Done = 'Done',
    Failed = 'Failed'
}

const ALLOWED_TRANSITIONS: Record<RestorePhase, readonly RestorePhase[]> = {
    [RestorePhase.Probing]: [RestorePhase.Reclaiming, RestorePhase.Restoring, RestorePhase.Failed],
    [RestorePhase.Reclaiming]: [RestorePhase.Dropping, RestorePhase.Done, RestorePhase.Failed],
    [RestorePhase.Dropping]: [RestorePhase.Restoring, RestorePhase.Failed],
    [RestorePhase.Restoring]: [RestorePhase.Finalizing, RestorePhase.Failed],
    [RestorePhase.Finalizing]: [RestorePhase.Done, RestorePhase.Failed],
    [RestorePhase.Done]: [],
    [RestorePhase.Failed]: []
};

export function canTransition(from: RestorePhase, to: RestorePhase): boolean {
    return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isTerminal(phase: RestorePhase): boolean {
    return ALLOWED_TRANSITIONS[phase].length === 0;
}

/**
 * Records the path a run takes and rejects any move the table does not allow.
 */
export class PhaseTracker {
    private readonly history: RestorePhase[] = [RestorePhase.Probing];

    get current(): RestorePhase {
        return this.history[this.history.length - 1];
    }

    get path(): readonly RestorePhase[] {
        return [...this.history];
    }

    transition(next: RestorePhase): void {
        if (!canTransition(this.current, next)) {
            throw new Error(`Invalid restore transition: ${this.current} -> ${next}`);
        }
        this.history.push(next);
    }

    /** Moves to Failed from any non-terminal phase; a no-op once terminal. */
    fail(): void {
        if (!isTerminal(this.current)) {
            this.history.push(RestorePhase.Failed);
        }
    }
}
