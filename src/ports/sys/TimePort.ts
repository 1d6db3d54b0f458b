export interface TimePort {
  now(): number;
  toISOString(epochMs: number): string;
}
