/**
 * @fileoverview Unit tests for LifecycleController
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { v4 as uuidv4 } from 'uuid';
import { LifecycleController } from './lifecycle.js';
import { AgentPhase, createUniqueId } from '../types/index.js';

describe('LifecycleController', () => {
  let controller: LifecycleController;

  beforeEach(() => {
    controller = new LifecycleController();
  });

  describe('initial state', () => {
    it('should start in INIT phase', () => {
      expect(controller.getCurrentPhase()).toBe(AgentPhase.INIT);
    });

    it('should not be in terminal state initially', () => {
      expect(controller.isTerminal()).toBe(false);
    });

    it('should have step number 0', () => {
      expect(controller.getStepNumber()).toBe(0);
    });

    it('should keep a provided run id', () => {
      const runId = createUniqueId(uuidv4());
      expect(new LifecycleController(runId).getState().runId).toBe(runId);
    });
  });

  describe('transition()', () => {
    it('should count each entry into STEPPING as a step', () => {
      controller.transition(AgentPhase.STEPPING, 'Step 1');
      controller.transition(AgentPhase.STEPPING, 'Step 2');
      controller.transition(AgentPhase.STEPPING, 'Step 3');

      expect(controller.getStepNumber()).toBe(3);
    });

    it.each([
      AgentPhase.TERMINATED,
      AgentPhase.STEP_LIMIT_REACHED,
      AgentPhase.INTERRUPTED,
      AgentPhase.FATAL,
    ])('should allow STEPPING to %s', (phase) => {
      controller.transition(AgentPhase.STEPPING, 'Step 1');
      controller.transition(phase, 'End');

      expect(controller.getCurrentPhase()).toBe(phase);
      expect(controller.isTerminal()).toBe(true);
    });

    it('should allow an interrupt before the first step', () => {
      controller.transition(AgentPhase.INTERRUPTED, 'Cancelled');
      expect(controller.getCurrentPhase()).toBe(AgentPhase.INTERRUPTED);
    });

    it('should throw on invalid transitions', () => {
      expect(() => controller.transition(AgentPhase.TERMINATED, 'Invalid')).toThrow(
        "Invalid transition: 'INIT' → 'TERMINATED'",
      );
    });

    it('should throw on transitions from terminal states', () => {
      controller.transition(AgentPhase.STEPPING, 'Step 1');
      controller.transition(AgentPhase.TERMINATED, 'Done');

      expect(() => controller.transition(AgentPhase.STEPPING, 'Again')).toThrow(
        "Cannot transition from terminal state 'TERMINATED'",
      );
    });

    it('should emit transition event on valid transition', () => {
      const handler = vi.fn();
      controller.on('transition', handler);

      controller.transition(AgentPhase.STEPPING, 'Starting');

      expect(handler).toHaveBeenCalledWith(AgentPhase.INIT, AgentPhase.STEPPING, 'Starting');
    });

    it('should emit error event on invalid transition', () => {
      const handler = vi.fn();
      controller.on('error', handler);

      expect(() => controller.transition(AgentPhase.STEP_LIMIT_REACHED, 'Invalid')).toThrow();
      expect(handler).toHaveBeenCalledWith(expect.objectContaining({
        code: 'INVALID_TRANSITION',
        phase: AgentPhase.INIT,
        attemptedTransition: AgentPhase.STEP_LIMIT_REACHED,
      }));
    });
  });

  describe('canTransition()', () => {
    it('should return true for valid transitions', () => {
      expect(controller.canTransition(AgentPhase.STEPPING)).toBe(true);
    });

    it('should return false for invalid transitions', () => {
      expect(controller.canTransition(AgentPhase.TERMINATED)).toBe(false);
      expect(controller.canTransition(AgentPhase.INIT)).toBe(false);
    });
  });

  describe('fail()', () => {
    it('should transition to FATAL from a running phase', () => {
      controller.transition(AgentPhase.STEPPING, 'Step 1');
      controller.fail('memory corrupted');

      expect(controller.getCurrentPhase()).toBe(AgentPhase.FATAL);
      expect(controller.isTerminal()).toBe(true);
    });

    it('should do nothing from terminal states', () => {
      controller.transition(AgentPhase.STEPPING, 'Step 1');
      controller.transition(AgentPhase.TERMINATED, 'Done');

      controller.fail('late error');
      expect(controller.getCurrentPhase()).toBe(AgentPhase.TERMINATED);
    });

    it('should emit transition event when failing', () => {
      const handler = vi.fn();
      controller.transition(AgentPhase.STEPPING, 'Step 1');

      controller.on('transition', handler);
      controller.fail('test error');

      expect(handler).toHaveBeenCalledWith(AgentPhase.STEPPING, AgentPhase.FATAL, 'test error');
    });
  });

  describe('phase history', () => {
    it('should record exited phases in order', () => {
      controller.transition(AgentPhase.STEPPING, 'Step 1');
      controller.transition(AgentPhase.STEPPING, 'Step 2');
      controller.transition(AgentPhase.TERMINATED, 'Done');

      const history = controller.getState().phaseHistory;
      expect(history.map(entry => [entry.phase, entry.stepNumber])).toEqual([
        [AgentPhase.INIT, 0],
        [AgentPhase.STEPPING, 1],
        [AgentPhase.STEPPING, 2],
      ]);
      expect(history.every(entry => entry.exitedAt !== null)).toBe(true);
    });
  });

  describe('phase events', () => {
    it('should emit phase:enter event', () => {
      const handler = vi.fn();
      controller.on('phase:enter', handler);

      controller.transition(AgentPhase.STEPPING, 'Starting');

      expect(handler).toHaveBeenCalledWith(
        AgentPhase.STEPPING,
        expect.objectContaining({ reason: 'Starting', stepNumber: 1 }),
      );
    });

    it('should emit phase:exit event', () => {
      const handler = vi.fn();
      controller.on('phase:exit', handler);

      controller.transition(AgentPhase.STEPPING, 'Starting');

      expect(handler).toHaveBeenCalledWith(AgentPhase.INIT, expect.any(Object));
    });
  });
});
