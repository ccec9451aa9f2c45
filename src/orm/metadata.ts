import type { ColumnMetadata } from './types.js';

export interface EntityMetadata {
  tableName: string;
  /** Keyed by property name, in declaration order. */
  columns: Map<string, ColumnMetadata>;
}

export type EntityConstructor<T extends object = object> = new () => T;

class MetadataStorage {
  private entities: Map<Function, EntityMetadata> = new Map();

  registerEntity(target: Function, tableName: string): void {
    this.ensureEntity(target).tableName = tableName;
  }

  registerColumn(target: Function, propertyName: string, metadata: Partial<ColumnMetadata>): void {
    const entity = this.ensureEntity(target);

    const existing = entity.columns.get(propertyName) ?? {
      propertyName,
      name: toSnakeCase(propertyName),
      type: 'string',
      sqlType: '',
      primaryKey: false,
      nullable: false,
      unique: false,
      autoIncrement: false,
    };

    entity.columns.set(propertyName, { ...existing, ...metadata });
  }

  getEntityMetadata(target: Function): EntityMetadata | undefined {
    return this.entities.get(target);
  }

  private ensureEntity(target: Function): EntityMetadata {
    let entity = this.entities.get(target);
    if (!entity) {
      entity = { tableName: toSnakeCase(target.name), columns: new Map() };
      this.entities.set(target, entity);
    }
    return entity;
  }

  clear(): void {
    this.entities.clear();
  }
}

export function toSnakeCase(str: string): string {
  return str
    .replace(/([A-Z])/g, '_$1')
    .toLowerCase()
    .replace(/^_/, '');
}

export const metadataStorage = new MetadataStorage();
