import { z } from 'zod';

// ============================================
// Supervisor State: connection lifecycle
// ============================================

export const SupervisorStateSchema = z.enum([
  'idle',
  'connecting',
  'connected',
  'closing',
  'waiting',
  'terminated',
  'stopped',
]);

export type SupervisorState = z.infer<typeof SupervisorStateSchema>;

/**
 * Allowed supervisor state transitions.
 *
 * idle       -> connecting | stopped
 * connecting -> connected | waiting | terminated | stopped   (waiting after a failed connect)
 * connected  -> closing                                       (session over, whatever the reason)
 * closing    -> waiting | terminated | stopped
 * waiting    -> connecting | terminated | stopped             (reconnect delay)
 * terminated, stopped: final
 */
export const SUPERVISOR_TRANSITIONS = {
  idle: ['connecting', 'stopped'],
  connecting: ['connected', 'waiting', 'terminated', 'stopped'],
  connected: ['closing'],
  closing: ['waiting', 'terminated', 'stopped'],
  waiting: ['connecting', 'terminated', 'stopped'],
  terminated: [],
  stopped: [],
} as const satisfies Record<SupervisorState, readonly SupervisorState[]>;
