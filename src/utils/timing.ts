export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait for `promise` for at most `ms`. Resolves true when it settled in time,
 * false on timeout. A rejection counts as settled.
 */
export function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
    return new Promise((resolve) => {
        const timer = setTimeout(() => resolve(false), ms);
        timer.unref();
        promise.then(
            () => { clearTimeout(timer); resolve(true); },
            () => { clearTimeout(timer); resolve(true); }
        );
    });
}
