import fs from "fs";
import path from "path";
import { z } from "zod";
import type { Action, ActionFields } from "./actions.types.js";
import { NotFoundError, StorageError } from "./actions.errors.js";
import { systemClock, validateFields, validatePatch, type Clock } from "./actions.validation.js";
import { createWriteLock } from "./writeLock.js";

export type ActionStoreOptions = {
  filePath: string;
  clock?: Clock;
};

// shape check only; business rules (future dates etc.) apply on write
const storedActions = z.array(
  z.object({
    id: z.number().int().positive().max(Number.MAX_SAFE_INTEGER),
    action: z.string(),
    date: z.string(),
    points: z.number().int().max(Number.MAX_SAFE_INTEGER),
  })
);

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function toRecord(id: number, fields: ActionFields): Action {
  return { id, action: fields.action, date: fields.date, points: fields.points };
}

/**
 * File-backed CRUD store for actions.
 *
 * The backing file holds a bare JSON array. Reads go straight to disk.
 * Mutations take the write lock, reload the file, apply the change and
 * replace the file through a temp file + rename, so another reader only
 * ever sees a whole array.
 */
export class ActionStore {
  readonly filePath: string;
  private readonly clock: Clock;
  private readonly lock = createWriteLock();

  // highest id ever issued by this instance, so deleting the newest record
  // does not hand its id out again
  private highWater = 0;
  private closed = false;

  constructor(options: ActionStoreOptions) {
    this.filePath = path.resolve(options.filePath);
    this.clock = options.clock ?? systemClock;
  }

  async open(): Promise<void> {
    if (this.closed) throw new StorageError("store is closed");

    await this.lock.run(async () => {
      const actions = await this.load();
      if (!(await this.exists())) await this.persist(actions);
      this.highWater = Math.max(this.highWater, maxId(actions));
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.lock.idle();
  }

  async list(): Promise<Action[]> {
    return this.load();
  }

  async get(id: number): Promise<Action> {
    const found = (await this.load()).find((a) => a.id === id);
    if (!found) throw new NotFoundError(id);
    return found;
  }

  async create(input: unknown): Promise<Action> {
    const fields = validateFields(input, this.clock);

    return this.mutate((actions) => {
      const id = Math.max(this.highWater, maxId(actions)) + 1;
      const created = toRecord(id, fields);
      this.highWater = id;
      return { next: [...actions, created], result: created };
    });
  }

  /** PUT when `partial` is false (every field required), PATCH when true. */
  async update(id: number, input: unknown, partial: boolean): Promise<Action> {
    return this.mutate((actions) => {
      const idx = actions.findIndex((a) => a.id === id);
      const current = actions[idx];
      if (idx === -1 || !current) throw new NotFoundError(id);

      const fields: ActionFields = partial
        ? { ...pickFields(current), ...validatePatch(input, this.clock) }
        : validateFields(input, this.clock);

      const updated = toRecord(id, fields);
      const next = [...actions];
      next[idx] = updated;
      return { next, result: updated };
    });
  }

  async delete(id: number): Promise<void> {
    await this.mutate((actions) => {
      const next = actions.filter((a) => a.id !== id);
      if (next.length === actions.length) throw new NotFoundError(id);
      return { next, result: undefined };
    });
  }

  private async mutate<T>(apply: (actions: Action[]) => { next: Action[]; result: T }): Promise<T> {
    if (this.closed) throw new StorageError("store is closed");

    return this.lock.run(async () => {
      const actions = await this.load();
      this.highWater = Math.max(this.highWater, maxId(actions));
      const { next, result } = apply(actions);
      await this.persist(next);
      return result;
    });
  }

  private async exists(): Promise<boolean> {
    try {
      await fs.promises.access(this.filePath);
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw new StorageError(`Cannot access ${this.filePath}`, { cause: err });
    }
  }

  private async load(): Promise<Action[]> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isMissing(err)) return [];
      throw new StorageError(`Cannot read ${this.filePath}`, { cause: err });
    }

    if (!raw.trim()) return [];

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new StorageError(`${this.filePath} is not valid JSON`, { cause: err });
    }

    const parsed = storedActions.safeParse(data);
    if (!parsed.success) {
      throw new StorageError(`${this.filePath} is not a valid actions file`, { cause: parsed.error });
    }

    const ids = new Set(parsed.data.map((a) => a.id));
    if (ids.size !== parsed.data.length) {
      throw new StorageError(`${this.filePath} contains duplicate ids`);
    }

    return parsed.data;
  }

  private async persist(actions: Action[]): Promise<void> {
    const dir = path.dirname(this.filePath);
    const tmp = path.join(
      dir,
      `.${path.basename(this.filePath)}.${Date.now()}-${Math.random().toString(16).slice(2)}.tmp`
    );

    try {
      await fs.promises.mkdir(dir, { recursive: true });
      await fs.promises.writeFile(tmp, JSON.stringify(actions, null, 2), "utf-8");
      await fs.promises.rename(tmp, this.filePath);
    } catch (err) {
      // cleanup is best effort: the write failure is the error callers get
      await fs.promises.rm(tmp, { force: true }).catch(() => undefined);
      throw new StorageError(`Cannot write ${this.filePath}`, { cause: err });
    }
  }
}

function maxId(actions: Action[]): number {
  return actions.reduce((max, a) => Math.max(max, a.id), 0);
}

function pickFields(a: Action): ActionFields {
  return { action: a.action, date: a.date, points: a.points };
}
