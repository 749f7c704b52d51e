import type { Warning } from '../types';

const echoWarnings = process.env.NODE_ENV === 'development' || process.env.NODE_ENV === 'debug';

export function logWarning(message: Warning, warnings: Warning[]): void {
    warnings.push(message);
    if (echoWarnings)
        console.warn(typeof message === 'string' ? message : JSON.stringify(message));
}
