/**
 * Formatted console output helpers
 */

let verbose = false;

/**
 * Enables debug output (--verbose).
 */
export function setVerbose(enabled: boolean): void {
    verbose = enabled;
}

export function log(message: string): void {
    console.log(message);
}

export function success(message: string): void {
    console.log(`✓ ${message}`);
}

export function warn(message: string): void {
    console.warn(`⚠️  ${message}`);
}

export function error(message: string): void {
    console.error(`✖ ${message}`);
}

export function info(message: string): void {
    console.info(`ℹ ${message}`);
}

export function arrow(message: string): void {
    console.log(`→ ${message}`);
}

export function debug(message: string): void {
    if (verbose) {
        console.debug(`· ${message}`);
    }
}
