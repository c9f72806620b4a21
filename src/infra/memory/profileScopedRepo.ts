import type { NewRecord, Persisted } from '../../domain/audit.js';
import type { ProfileScopedRepository } from '../../domain/portfolio/ports.js';

export type Comparator<T> = (a: T, b: T) => number;

/**
 * Map-backed store for a profile-owned resource. Ids are assigned from a
 * counter starting at 1; soft-deleted rows stay in the map but are hidden
 * from every read.
 */
export class InMemoryProfileScopedRepo<TData extends { readonly profileId: number }>
  implements ProfileScopedRepository<TData>
{
  protected readonly rows = new Map<number, Persisted<TData>>();
  private nextId = 1;

  constructor(protected readonly order: Comparator<Persisted<TData>>) {}

  async findById(id: number): Promise<Persisted<TData> | null> {
    const row = this.rows.get(id);
    return row && row.isActive ? row : null;
  }

  async findAllByProfileId(profileId: number): Promise<Persisted<TData>[]> {
    return this.active()
      .filter((row) => row.profileId === profileId)
      .sort(this.order);
  }

  async save(record: NewRecord<TData>): Promise<Persisted<TData>> {
    const row: Persisted<TData> = {
      ...record,
      id: this.nextId++,
      createdAt: new Date(),
      updatedAt: null,
      updatedBy: null,
      isActive: true,
    };
    this.rows.set(row.id, row);
    return row;
  }

  async update(record: Persisted<TData>): Promise<Persisted<TData>> {
    if (!(await this.findById(record.id))) {
      throw new Error(`Record ${record.id} does not exist`);
    }
    this.rows.set(record.id, record);
    return record;
  }

  async delete(id: number, deletedBy: number): Promise<boolean> {
    const row = await this.findById(id);
    if (!row) {
      return false;
    }
    this.rows.set(id, { ...row, isActive: false, updatedAt: new Date(), updatedBy: deletedBy });
    return true;
  }

  protected active(): Persisted<TData>[] {
    return [...this.rows.values()].filter((row) => row.isActive);
  }
}
