import { UnknownEntityError, UnknownFieldError } from '../errors'
import type {
  EntityDefinition, EntityName, FieldType, FilterCapability, FilterOperator,
  RelationDefinition, ResolvedField,
} from './types'

export const OPERATORS_BY_TYPE: Readonly<Record<FieldType, readonly FilterOperator[]>> = {
  string: ['equals', 'contains', 'isnull'],
  int:    ['equals', 'gte', 'lte', 'gt', 'lt', 'range', 'isnull'],
  date:   ['equals', 'gte', 'lte', 'gt', 'lt', 'range', 'isnull'],
}

interface CompiledEntity {
  definition: EntityDefinition
  fields:     ReadonlyMap<string, ResolvedField>
  filterable: ReadonlyMap<string, FilterCapability>
  orderable:  ReadonlyMap<string, ResolvedField>
  searchable: readonly ResolvedField[]
  nameFields: readonly ResolvedField[]
}

/**
 * Read-only lookup of what each entity allows to be filtered, ordered and
 * searched. Built once from declarations; every path is checked against the
 * declared columns at creation time.
 */
export class SchemaRegistry {
  private constructor(private readonly entities: ReadonlyMap<string, CompiledEntity>) {}

  static create(definitions: readonly EntityDefinition[]): SchemaRegistry {
    const byName = new Map<EntityName, EntityDefinition>()
    for (const def of definitions) {
      if (byName.has(def.name)) throw new Error(`Entity ${def.name} declared twice`)
      byName.set(def.name, def)
    }

    const compiled = new Map<string, CompiledEntity>()
    for (const def of definitions) {
      compiled.set(def.name, compileEntity(def, byName))
    }
    return new SchemaRegistry(compiled)
  }

  entityNames(): EntityName[] {
    return [...this.entities.values()].map(e => e.definition.name)
  }

  isEntity(name: string): name is EntityName {
    return this.entities.has(name)
  }

  entity(name: string): EntityDefinition {
    return this.compiled(name).definition
  }

  resolve(entity: EntityName, path: string): ResolvedField {
    const field = this.compiled(entity).fields.get(path)
    if (!field) throw new UnknownFieldError(entity, path)
    return field
  }

  filterable(entity: EntityName, path: string): FilterCapability {
    const field = this.compiled(entity).filterable.get(path)
    if (!field) throw new UnknownFieldError(entity, path, 'filterable')
    return field
  }

  orderable(entity: EntityName, path: string): ResolvedField {
    const field = this.compiled(entity).orderable.get(path)
    if (!field) throw new UnknownFieldError(entity, path, 'orderable')
    return field
  }

  searchable(entity: EntityName): readonly ResolvedField[] {
    return this.compiled(entity).searchable
  }

  nameFields(entity: EntityName): readonly ResolvedField[] {
    return this.compiled(entity).nameFields
  }

  /** Every field exposed in a result row, base columns first. */
  selectable(entity: EntityName): readonly ResolvedField[] {
    return [...this.compiled(entity).fields.values()]
  }

  joins(entity: EntityName): readonly RelationDefinition[] {
    return this.compiled(entity).definition.relations
  }

  private compiled(name: string): CompiledEntity {
    const entity = this.entities.get(name)
    if (!entity) throw new UnknownEntityError(name)
    return entity
  }
}

// ------------------------------------------------------------------
// Compilation
// ------------------------------------------------------------------

function compileEntity(
  def:    EntityDefinition,
  byName: ReadonlyMap<EntityName, EntityDefinition>
): CompiledEntity {
  const fields = new Map<string, ResolvedField>()

  for (const [column, type] of Object.entries(def.columns)) {
    fields.set(column, Object.freeze({ path: column, entity: def.name, relation: null, column, type }))
  }

  for (const relation of def.relations) {
    const target = byName.get(relation.target)
    if (!target) throw new Error(`${def.name}.${relation.name} targets undeclared entity ${relation.target}`)
    if (target.table !== relation.table) {
      throw new Error(`${def.name}.${relation.name}: table ${relation.table} does not belong to ${target.name}`)
    }
    if (!(relation.targetColumn in target.columns)) {
      throw new Error(`${def.name}.${relation.name}: unknown target column ${relation.targetColumn}`)
    }
    if (!(relation.localColumn in def.columns) && relation.localColumn !== def.primaryKey) {
      throw new Error(`${def.name}.${relation.name}: unknown local column ${relation.localColumn}`)
    }
    for (const [column, type] of Object.entries(target.columns)) {
      const path = `${relation.name}.${column}`
      fields.set(path, Object.freeze({ path, entity: target.name, relation, column, type }))
    }
  }

  const lookup = (path: string): ResolvedField => {
    const field = fields.get(path)
    if (!field) throw new UnknownFieldError(def.name, path)
    return field
  }

  const filterable = new Map<string, FilterCapability>()
  for (const [path, operators] of Object.entries(def.filterable)) {
    const field   = lookup(path)
    const allowed = OPERATORS_BY_TYPE[field.type]
    for (const op of operators) {
      if (!allowed.includes(op)) {
        throw new Error(`${def.name}.${path}: operator ${op} is not valid for ${field.type} fields`)
      }
    }
    filterable.set(path, Object.freeze({ ...field, operators: Object.freeze([...operators]) }))
  }

  const orderable = new Map<string, ResolvedField>()
  for (const path of def.orderable) orderable.set(path, lookup(path))

  for (const token of def.defaultOrdering) {
    const path = token.startsWith('-') ? token.slice(1) : token
    if (!orderable.has(path)) throw new Error(`${def.name}: default ordering field ${path} is not orderable`)
  }

  return {
    definition: Object.freeze(def),
    fields,
    filterable,
    orderable,
    searchable: Object.freeze(def.searchable.map(lookup)),
    nameFields: Object.freeze((def.nameFields ?? []).map(lookup)),
  }
}
