/**
 * Base for entities whose whole state is one validated props object that
 * carries its own id.
 */
export abstract class Entity<TProps extends { id: string }> {
  protected constructor(protected readonly props: TProps) {}

  get id(): string {
    return this.props.id;
  }

  /** Same concrete class and same id. */
  equals(other: Entity<TProps> | null | undefined): boolean {
    if (other == null) return false;
    if (this === other) return true;
    return other.constructor === this.constructor && other.id === this.id;
  }

  /** Frozen snapshot of the current state, for persistence. */
  toProps(): Readonly<TProps> {
    return Object.freeze({ ...this.props });
  }
}
