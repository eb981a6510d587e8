export interface ClockSource {
  currentHeight(): number;
}

/**
 * Logical height that only moves forward when told to.
 */
export class ManualClock implements ClockSource {
  constructor(private height: number = 0) {}

  currentHeight(): number {
    return this.height;
  }

  advanceTo(height: number): boolean {
    if (!Number.isSafeInteger(height) || height < this.height) {
      return false;
    }
    this.height = height;
    return true;
  }
}
