/**
 * Base Repository Interface for Cadence
 *
 * The generic repository interface entity repositories implement. The
 * Repository pattern keeps Drizzle queries out of the services, which work
 * with domain models only.
 *
 * Updates are not part of the generic interface: card writes are
 * version-checked and rule sets are replaced wholesale, so each repository
 * exposes the update operations its entity actually supports.
 */

/**
 * Generic repository interface defining the shared read/create/delete
 * operations.
 *
 * @typeParam T - The domain model type returned by the repository
 * @typeParam CreateInput - The type for creating new entities
 *
 * @example
 * ```typescript
 * class CardRepository implements Repository<Card, CreateCardInput> {
 *   async findById(id: string): Promise<Card | null> {
 *     // implementation
 *   }
 *   // ... other methods
 * }
 * ```
 */
export interface Repository<T, CreateInput> {
  /**
   * Retrieves an entity by its unique identifier.
   *
   * @returns The domain model if found, or null if not found
   */
  findById(id: string): Promise<T | null>;

  /**
   * Retrieves all entities of this type.
   */
  findAll(): Promise<T[]>;

  /**
   * Creates a new entity and persists it to the database.
   */
  create(input: CreateInput): Promise<T>;

  /**
   * Permanently deletes an entity from the database.
   *
   * @throws AppError (NOT_FOUND) if the entity does not exist
   */
  delete(id: string): Promise<void>;
}
