import { Task } from '@scheduler/domain/Task';
import { AddTaskResult } from '@scheduler/domain/AddTaskResult';
import { ReentrantUpdateError } from '@shared/kernel/DomainError';

/**
 * Keyed, owning collection of tasks polled together.
 *
 * `add` and `remove` never throw; they report what happened instead.
 * Both may be called from inside a task's work: the sweep in progress
 * iterates a snapshot, skips tasks removed mid-sweep, and leaves tasks
 * added mid-sweep for the next `update()`.
 */
export class TaskManager {
  private readonly tasks = new Map<string, Task>();
  private readonly owned = new Set<Task>();
  private readonly generatedKeys = new WeakMap<Task, string>();
  private keySequence = 0;

  // Snapshot buffer shared by every sweep.
  private readonly sweep: Task[] = [];
  private sweeping = false;

  get size(): number {
    return this.tasks.size;
  }

  /**
   * Takes `task` under `key`, or under a generated key when none is given.
   * The same instance gets the same generated key unless another task
   * has since taken it.
   */
  add(task: Task, key: string = this.generatedKeyFor(task)): AddTaskResult {
    if (this.tasks.has(key)) {
      return { added: false, key, task, reason: 'DUPLICATE_KEY' };
    }
    if (this.owned.has(task)) {
      return { added: false, key, task, reason: 'ALREADY_OWNED' };
    }

    this.tasks.set(key, task);
    this.owned.add(task);
    return { added: true, key };
  }

  remove(key: string): boolean {
    const task = this.tasks.get(key);
    if (!task) return false;

    this.tasks.delete(key);
    this.owned.delete(task);
    return true;
  }

  has(key: string): boolean {
    return this.tasks.has(key);
  }

  get(key: string): Task | undefined {
    return this.tasks.get(key);
  }

  keys(): string[] {
    return [...this.tasks.keys()];
  }

  clear(): void {
    this.tasks.clear();
    this.owned.clear();
  }

  /**
   * Polls every task once and returns how many fired. An error thrown by
   * a task's work aborts the rest of the sweep and propagates.
   */
  update(): number {
    if (this.sweeping) {
      throw new ReentrantUpdateError('update() cannot be called from inside a task');
    }

    this.sweeping = true;
    for (const task of this.tasks.values()) {
      this.sweep.push(task);
    }

    let fired = 0;
    try {
      for (let i = 0; i < this.sweep.length; i++) {
        const task = this.sweep[i];
        if (!this.owned.has(task)) continue;
        if (task.update()) fired++;
      }
    } finally {
      this.sweep.length = 0;
      this.sweeping = false;
    }
    return fired;
  }

  private generatedKeyFor(task: Task): string {
    const existing = this.generatedKeys.get(task);
    if (existing !== undefined) {
      const holder = this.tasks.get(existing);
      if (holder === undefined || holder === task) return existing;
    }

    let key: string;
    do {
      key = `task-${++this.keySequence}`;
    } while (this.tasks.has(key));

    this.generatedKeys.set(task, key);
    return key;
  }
}
