import { z } from 'zod';
import { TaskKind } from '../types/task.js';

/** Record variants accepted on load. `Task` is the legacy shape without a deadline. */
export const RecordTypeSchema = z.enum(['Task', TaskKind.Deadline]);

export const StoredTaskRecordSchema = z.object({
  id: z.number().int().positive(),
  title: z.string(),
  description: z.string().default(''),
  category: z.string().optional(),
  completed: z.boolean().optional(),
  created_date: z.string().optional(),
  deadline: z.string().optional(),
  type: RecordTypeSchema.optional(),
});

export type StoredTaskRecord = z.infer<typeof StoredTaskRecordSchema>;

export const TaskFileSchema = z.array(StoredTaskRecordSchema).superRefine((records, ctx) => {
  const seen = new Set<number>();
  records.forEach((record, index) => {
    if (seen.has(record.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `duplicate task id ${record.id}`,
        path: [index, 'id'],
      });
    }
    seen.add(record.id);
  });
});

/** One-line summary of a zod failure for log and error messages */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
