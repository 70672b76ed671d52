// =================================================================
// ERRORS
// =================================================================
//
//   ConfigError   bad startup flags. Fatal, the process exits.
//   ForwardError  one delivery to one backend failed. Recovered
//                 by the retry escalator, never shown to the client.
// =================================================================

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export class ForwardError extends Error {
    constructor(
        public readonly backend: string,
        message: string,
        // true once the client response has started; the request can't be replayed then
        public readonly responseStarted: boolean = false,
    ) {
        super(message);
        this.name = 'ForwardError';
    }
}
