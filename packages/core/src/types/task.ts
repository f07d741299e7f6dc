export type TaskId = number;

export interface Task {
  readonly id: TaskId;
  readonly description: string;
  readonly completed: boolean;
  readonly createdAt: string; // ISO string
}
