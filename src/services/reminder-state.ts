import { IllegalTransitionError } from '../errors.js';
import type { ReminderState } from '../db/models/Reminder.js';

export type FireOutcome = { ok: true } | { ok: false; error: string };

export type ReminderEvent =
  | { type: 'arm'; dueAt: Date; destination: string | null }
  | { type: 'disable' }
  | { type: 'fire'; outcome: FireOutcome }
  | { type: 'retry' };

/** What the caller has to persist alongside the new state. */
export type ReminderEffect =
  | { type: 'schedule'; dueAt?: Date; destination?: string | null; resetAttempts: boolean }
  | { type: 'cancel' }
  | { type: 'record_sent' }
  | { type: 'record_failure'; error: string };

export interface Transition {
  state: ReminderState;
  effects: ReminderEffect[];
}

/**
 * Pure transition function for a reminder.
 *
 *   any     --arm-->           pending
 *   any     --disable-->       disabled
 *   pending --fire(ok)-->      sent
 *   pending --fire(failed)-->  failed
 *   failed  --retry-->         pending
 *
 * Anything else throws IllegalTransitionError.
 */
export function transition(state: ReminderState, event: ReminderEvent): Transition {
  switch (event.type) {
    case 'arm':
      return {
        state: 'pending',
        effects: [{ type: 'schedule', dueAt: event.dueAt, destination: event.destination, resetAttempts: true }],
      };

    case 'disable':
      return { state: 'disabled', effects: [{ type: 'cancel' }] };

    case 'fire':
      if (state !== 'pending') {
        throw new IllegalTransitionError(state, 'fire');
      }
      return event.outcome.ok
        ? { state: 'sent', effects: [{ type: 'record_sent' }] }
        : { state: 'failed', effects: [{ type: 'record_failure', error: event.outcome.error }] };

    case 'retry':
      if (state !== 'failed') {
        throw new IllegalTransitionError(state, 'retry');
      }
      return { state: 'pending', effects: [{ type: 'schedule', resetAttempts: false }] };
  }
}

/** Column changes written together with a state change. */
export interface ReminderPatch {
  due_at?: Date;
  destination?: string | null;
  attempts?: number | 'increment';
  last_error?: string | null;
  sent_at?: Date | null;
}

export function patchFor(effects: ReminderEffect[], now: Date): ReminderPatch {
  const patch: ReminderPatch = {};

  for (const effect of effects) {
    switch (effect.type) {
      case 'schedule':
        if (effect.dueAt) patch.due_at = effect.dueAt;
        if (effect.destination !== undefined) patch.destination = effect.destination;
        if (effect.resetAttempts) patch.attempts = 0;
        patch.last_error = null;
        patch.sent_at = null;
        break;
      case 'record_sent':
        patch.sent_at = now;
        patch.last_error = null;
        patch.attempts = 'increment';
        break;
      case 'record_failure':
        patch.last_error = effect.error;
        patch.attempts = 'increment';
        break;
      case 'cancel':
        break;
    }
  }

  return patch;
}

/** True iff the scheduler may fire this reminder at `now`. */
export function isDue(reminder: { state: ReminderState; due_at: Date }, now: Date): boolean {
  return reminder.state === 'pending' && reminder.due_at.getTime() <= now.getTime();
}
