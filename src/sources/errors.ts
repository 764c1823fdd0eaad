export class RetrievalError extends Error {
    constructor(message: string, public readonly details?: Record<string, unknown>) {
        super(message);
        this.name = 'RetrievalError';
    }
}

export class MissingSessionError extends RetrievalError {
    constructor(idCount: number) {
        super(`Invalid search result: missing session handle (WebEnv/QueryKey) for ${idCount} ids`, { idCount });
        this.name = 'MissingSessionError';
    }
}
