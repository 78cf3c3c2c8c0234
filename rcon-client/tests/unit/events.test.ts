// Unit tests for event names

import { describe, it, expect } from 'vitest';
import { ClientEvents, isClientEventName } from '../../src/events/eventNames.js';

describe('ClientEvents', () => {
  it('should recognize every event name', () => {
    for (const name of Object.values(ClientEvents)) {
      expect(isClientEventName(name)).toBe(true);
    }
  });

  it('should reject unknown names', () => {
    expect(isClientEventName('connected')).toBe(false);
    expect(isClientEventName('AUTHENTICATED')).toBe(false);
  });
});
