import { Task } from '@scheduler/domain/Task';

export type AddTaskResult =
  | { added: true; key: string }
  | {
      added: false;
      key: string;
      /** The rejected task, handed back untouched. */
      task: Task;
      reason: 'DUPLICATE_KEY' | 'ALREADY_OWNED';
    };
