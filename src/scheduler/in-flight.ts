/**
 * In-flight marker: at most one run per task id at any instant.
 *
 * `tryAcquire` is a synchronous test-and-insert, so two dispatches of the
 * same id can never interleave between the check and the insert.
 */
export class InFlightRegistry {
  private ids = new Set<string>();

  tryAcquire(taskId: string): boolean {
    if (this.ids.has(taskId)) {
      return false;
    }
    this.ids.add(taskId);
    return true;
  }

  release(taskId: string): void {
    this.ids.delete(taskId);
  }

  get size(): number {
    return this.ids.size;
  }
}
