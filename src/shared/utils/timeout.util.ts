// src/shared/utils/timeout.util.ts

/**
 * Races `operation` against a timer. The timer is always cleared so nothing
 * keeps the process alive after the operation settles.
 */
export async function withTimeout<T>(
    operation: Promise<T>,
    timeoutMs: number,
    onTimeout: () => Error
): Promise<T> {
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => reject(onTimeout()), timeoutMs);
    });

    try {
        return await Promise.race([operation, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
