import { Op } from 'sequelize';
import { v4 as uuidv4 } from 'uuid';

/**
 * In-process stand-in for the subset of the Sequelize static model API the
 * services use. Rows are cloned on the way in and out, so a service holding a
 * row never sees later writes, the same as with separate queries.
 */
type Row = Record<string, unknown>;
type Where = { [key: string | symbol]: unknown };
type OrderItem = [string, 'ASC' | 'DESC'];

interface FindOptions {
  where?: Where;
  order?: OrderItem[];
  limit?: number;
  offset?: number;
}

// structuredClone hands back native Dates, which fail `instanceof Date` once
// Jest fake timers have swapped the global Date, so check the brand instead.
export const isDate = (value: unknown): value is Date =>
  Object.prototype.toString.call(value) === '[object Date]';

const isPlainObject = (value: unknown): value is Where =>
  typeof value === 'object' && value !== null && !Array.isArray(value) && !isDate(value);

const comparable = (value: unknown): unknown => {
  if (isDate(value)) return value.getTime();
  return value;
};

const compare = (a: unknown, b: unknown): number => {
  const left = comparable(a);
  const right = comparable(b);
  if (left === right) return 0;
  if (left === null || left === undefined) return -1;
  if (right === null || right === undefined) return 1;
  if (typeof left === 'number' && typeof right === 'number') return left - right;
  return String(left) < String(right) ? -1 : 1;
};

const equals = (actual: unknown, expected: unknown): boolean => {
  if (expected === null) return actual === null || actual === undefined;
  return comparable(actual) === comparable(expected);
};

const likeToRegExp = (pattern: string): RegExp => {
  const escaped = pattern.replace(/[.*+?^${}()|[\]\\]/g, '\\$&').replace(/%/g, '.*').replace(/_/g, '.');
  return new RegExp(`^${escaped}$`, 'i');
};

const matchesOperators = (actual: unknown, condition: Where): boolean =>
  Object.getOwnPropertySymbols(condition).every((op) => {
    const expected = condition[op];
    switch (op) {
      case Op.eq:
        return equals(actual, expected);
      case Op.ne:
        return !equals(actual, expected);
      case Op.is:
        return equals(actual, expected);
      case Op.in:
        return Array.isArray(expected) && expected.some((item) => equals(actual, item));
      case Op.notIn:
        return Array.isArray(expected) && !expected.some((item) => equals(actual, item));
      case Op.lt:
        return actual !== null && actual !== undefined && compare(actual, expected) < 0;
      case Op.lte:
        return actual !== null && actual !== undefined && compare(actual, expected) <= 0;
      case Op.gt:
        return actual !== null && actual !== undefined && compare(actual, expected) > 0;
      case Op.gte:
        return actual !== null && actual !== undefined && compare(actual, expected) >= 0;
      case Op.iLike:
        return typeof actual === 'string' && typeof expected === 'string' && likeToRegExp(expected).test(actual);
      default:
        throw new Error(`InMemoryModel: unsupported operator ${String(op)}`);
    }
  });

export const matchesWhere = (row: Row, where: Where | undefined): boolean => {
  if (!where) return true;

  const fieldsMatch = Object.keys(where).every((key) => {
    const condition = where[key];
    const actual = row[key];
    if (Array.isArray(condition)) return condition.some((item) => equals(actual, item));
    if (isPlainObject(condition)) return matchesOperators(actual, condition);
    return equals(actual, condition);
  });
  if (!fieldsMatch) return false;

  return Object.getOwnPropertySymbols(where).every((op) => {
    const branches = where[op];
    if (!Array.isArray(branches)) throw new Error(`InMemoryModel: unsupported top-level operator ${String(op)}`);
    const results = branches.map((branch: Where) => matchesWhere(row, branch));
    if (op === Op.or) return results.some(Boolean);
    if (op === Op.and) return results.every(Boolean);
    throw new Error(`InMemoryModel: unsupported top-level operator ${String(op)}`);
  });
};

export class InMemoryModel<T extends object> {
  readonly rows: Row[] = [];

  constructor(private readonly defaults: () => Row = () => ({})) {}

  private fromRow(row: Row): T {
    return structuredClone(row) as T;
  }

  private select(options: FindOptions = {}): Row[] {
    const matched = this.rows.filter((row) => matchesWhere(row, options.where));
    if (options.order) {
      const order = options.order;
      matched.sort((a, b) => {
        for (const [field, direction] of order) {
          const result = compare(a[field], b[field]);
          if (result !== 0) return direction === 'DESC' ? -result : result;
        }
        return 0;
      });
    }
    const offset = options.offset ?? 0;
    return options.limit === undefined ? matched.slice(offset) : matched.slice(offset, offset + options.limit);
  }

  /** Seeds a row directly, bypassing defaults. */
  seed(values: Partial<T> & Row): T {
    const now = new Date();
    const row: Row = structuredClone({ id: uuidv4(), createdAt: now, updatedAt: now, ...values });
    this.rows.push(row);
    return this.fromRow(row);
  }

  all(): T[] {
    return this.rows.map((row) => this.fromRow(row));
  }

  async create(values: Partial<T>): Promise<T> {
    const now = new Date();
    const row: Row = structuredClone({ id: uuidv4(), createdAt: now, updatedAt: now, ...this.defaults(), ...values });
    this.rows.push(row);
    return this.fromRow(row);
  }

  async findByPk(id: string): Promise<T | null> {
    const row = this.rows.find((candidate) => candidate.id === id);
    return row ? this.fromRow(row) : null;
  }

  async findOne(options: FindOptions = {}): Promise<T | null> {
    const [row] = this.select({ ...options, limit: 1 });
    return row ? this.fromRow(row) : null;
  }

  async findAll(options: FindOptions = {}): Promise<T[]> {
    return this.select(options).map((row) => this.fromRow(row));
  }

  async findAndCountAll(options: FindOptions = {}): Promise<{ rows: T[]; count: number }> {
    const count = this.select({ where: options.where }).length;
    return { rows: await this.findAll(options), count };
  }

  async count(options: FindOptions = {}): Promise<number> {
    return this.select({ where: options.where }).length;
  }

  async update(values: Partial<T>, options: { where: Where }): Promise<[number]> {
    // Sequelize drops undefined attributes from an update.
    const changes: Row = structuredClone(
      Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined)),
    );
    const now = new Date();
    let affected = 0;
    for (const row of this.rows) {
      if (!matchesWhere(row, options.where)) continue;
      Object.assign(row, changes, { updatedAt: now });
      affected += 1;
    }
    return [affected];
  }

  async increment(field: keyof T & string, options: { where: Where; by?: number }): Promise<[T[], number]> {
    const by = options.by ?? 1;
    const touched: Row[] = [];
    for (const row of this.rows) {
      if (!matchesWhere(row, options.where)) continue;
      const current = row[field];
      row[field] = (typeof current === 'number' ? current : 0) + by;
      touched.push(row);
    }
    return [touched.map((row) => this.fromRow(row)), touched.length];
  }

  async destroy(options: { where: Where }): Promise<number> {
    const before = this.rows.length;
    const kept = this.rows.filter((row) => !matchesWhere(row, options.where));
    this.rows.splice(0, this.rows.length, ...kept);
    return before - kept.length;
  }
}
