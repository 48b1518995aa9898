export const Urgency = {
  Urgent: 'Urgent',
  Pending: 'Pending',
  Done: 'Done',
} as const;

export type Urgency = (typeof Urgency)[keyof typeof Urgency];
