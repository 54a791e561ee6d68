/**
 * Base Repository Interface
 *
 * Entity repositories implement this interface so services work with domain
 * models without knowing about Drizzle or SQLite. Activity and plan storage
 * have their own method sets; see the individual repositories.
 */

/**
 * Read-by-id and create operations shared by entity repositories.
 *
 * @typeParam T - The domain model type returned by the repository
 * @typeParam CreateInput - The type for creating new entities
 *
 * @example
 * ```typescript
 * class LearnerRepository implements Repository<Learner, CreateLearnerInput> {
 *   async findById(id: string): Promise<Learner | null> {
 *     // implementation
 *   }
 *   // ...
 * }
 * ```
 */
export interface Repository<T, CreateInput> {
  /**
   * @returns The domain model if found, or null if not found
   */
  findById(id: string): Promise<T | null>;

  /**
   * Persists a new entity.
   *
   * @returns The created domain model
   */
  create(input: CreateInput): Promise<T>;
}
