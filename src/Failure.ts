/**
 * Wraps an error so it can be passed through a ResultCallback and thrown into the resumed coroutine.
 */
export class Failure {
    constructor(readonly value: unknown) {
    }
}
