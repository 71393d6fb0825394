/**
 * Component Schema Definition
 *
 * A schema names one component kind and carries its value type. Components
 * are plain records: no behaviour, no inheritance, and never attached to the
 * entity value itself.
 *
 * @example
 * ```typescript
 * interface HealthData { current: number; max: number }
 * const HealthSchema = ComponentSchema.define<HealthData>("Health");
 *
 * const health = world.register(HealthSchema);
 * health.insert(entity, { current: 10, max: 10 });
 * ```
 */
export class ComponentSchema<T> {
  /** Type carrier only; never set at runtime. */
  declare readonly __data?: T;

  private constructor(public readonly name: string) {}

  static define<T>(name: string): ComponentSchema<T> {
    if (name.length === 0) {
      throw new Error("Component name cannot be empty");
    }
    return new ComponentSchema<T>(name);
  }

  toString(): string {
    return `Component(${this.name})`;
  }
}

/**
 * Value type carried by a schema.
 */
export type ComponentData<S> = S extends ComponentSchema<infer T> ? T : never;

/**
 * Tag components carry no data.
 */
export type TagData = Record<string, never>;
