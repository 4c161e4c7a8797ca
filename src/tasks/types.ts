import * as z from 'zod';
import { BloomLevelSchema } from '@/routing/capabilityConfig';

export const TaskStatusSchema = z.enum(['blocked', 'assigned', 'done']);
export type TaskStatus = z.infer<typeof TaskStatusSchema>;

export const TaskSchema = z.object({
    task_id: z.string().min(1),
    /** Groups the tasks a single command was broken into */
    parent_id: z.string().min(1),
    type: z.string().min(1),
    description: z.string(),
    /** Cognitive demand estimate, drives capability routing */
    bloom_level: BloomLevelSchema.optional(),
    /** Predecessors that must be done before this task is handed out */
    blocked_by: z.array(z.string().min(1)).optional(),
    /** The finished task this one corrects. Written once, never cleared */
    redo_of: z.string().min(1).optional(),
    /** Set on an archived task once a redo replaced it */
    superseded_by: z.string().min(1).optional(),
    status: TaskStatusSchema,
    /** When the task notice reached the worker's mailbox */
    announced_at: z.string().optional(),
    /** When the owner was told the task is done */
    reported_at: z.string().optional(),
    /** ISO-8601 time of the last transition */
    timestamp: z.string(),
});

export type Task = z.infer<typeof TaskSchema>;

/**
 * The task document kept for each worker: the current task plus the tasks it
 * finished before, so predecessors and redo chains stay resolvable after the
 * worker moves on.
 */
export const TaskDocumentSchema = z.object({
    task: TaskSchema.nullable().default(null),
    history: z.array(TaskSchema).default([]),
});

export type TaskDocument = z.infer<typeof TaskDocumentSchema>;

export interface NewTask {
    task_id: string;
    parent_id: string;
    type: string;
    description: string;
    bloom_level?: number;
    blocked_by?: string[];
    redo_of?: string;
}

export type DeliveryMarker = 'announced_at' | 'reported_at';

export interface LocatedTask {
    workerId: string;
    task: Task;
    /** False when the task was found in the worker's history */
    current: boolean;
}
