/** Readiness flag behind `/health`: false until listening, false again once shutdown starts. */
export class HealthState {
  private healthy = false;

  markReady(): void {
    this.healthy = true;
  }

  markShuttingDown(): void {
    this.healthy = false;
  }

  isHealthy(): boolean {
    return this.healthy;
  }
}
