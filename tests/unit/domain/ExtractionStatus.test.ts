import { describe, it, expect } from 'vitest';
import { ExtractionStatus, canTransition } from '../../../src/domain/model/ExtractionStatus.js';

describe('ExtractionStatus', () => {
  it('should allow a run to start only from CREATED', () => {
    expect(canTransition(ExtractionStatus.CREATED, ExtractionStatus.PROCESSING)).toBe(true);
    expect(canTransition(ExtractionStatus.COMPLETED, ExtractionStatus.PROCESSING)).toBe(false);
    expect(canTransition(ExtractionStatus.FAILED, ExtractionStatus.PROCESSING)).toBe(false);
  });

  it('should allow every terminal status from PROCESSING', () => {
    expect(canTransition(ExtractionStatus.PROCESSING, ExtractionStatus.COMPLETED)).toBe(true);
    expect(canTransition(ExtractionStatus.PROCESSING, ExtractionStatus.ABORTED)).toBe(true);
    expect(canTransition(ExtractionStatus.PROCESSING, ExtractionStatus.FAILED)).toBe(true);
  });

  it('should not allow finishing a run that never started', () => {
    expect(canTransition(ExtractionStatus.CREATED, ExtractionStatus.COMPLETED)).toBe(false);
  });
});
