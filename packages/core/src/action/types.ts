import type { FieldSerializer } from '../message/types.js';

/** Value of the `action_status` field. */
export type ActionStatus = 'started' | 'succeeded' | 'failed';

/**
 * Per-action-type serializers, one for each message an action emits.
 * Built by `defineActionType()`, or written by hand.
 */
export interface ActionSerializers {
    readonly start: FieldSerializer;
    readonly success: FieldSerializer;
    readonly failure: FieldSerializer;
}

/** Fields identifying an action, merged into its start and finish messages. */
export interface ActionIdentification {
    readonly task_uuid: string;
    readonly task_level: string;
    readonly action_type: string;
}
