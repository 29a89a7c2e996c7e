import { SafeError } from '../../src/core/errors.js';

/**
 * Awaits a promise expected to reject with a SafeError and returns it
 */
export async function captureError(promise: Promise<unknown>): Promise<SafeError> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof SafeError) {
            return error;
        }
        throw error;
    }
    throw new Error('Expected the operation to fail');
}
