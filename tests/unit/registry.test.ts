import { describe, it, expect } from 'vitest'
import { UnknownEntityError, UnknownFieldError } from '../../src/errors'
import { ADDRESS, APP_USER, CUSTOMER_RELATIONSHIP, contactsRegistry } from '../../src/schema/contacts'
import { SchemaRegistry } from '../../src/schema/registry'
import type { EntityDefinition } from '../../src/schema/types'

describe('contactsRegistry', () => {
  it('declares the three entities', () => {
    expect(contactsRegistry.entityNames()).toEqual(['AppUser', 'Address', 'CustomerRelationship'])
    expect(contactsRegistry.isEntity('AppUser')).toBe(true)
    expect(contactsRegistry.isEntity('Order')).toBe(false)
  })

  it('resolves a related field through its relation', () => {
    const field = contactsRegistry.filterable('AppUser', 'relationship.points')
    expect(field.path).toBe('relationship.points')
    expect(field.entity).toBe('CustomerRelationship')
    expect(field.column).toBe('points')
    expect(field.type).toBe('int')
    expect(field.relation?.table).toBe('customer_relationship')
    expect(field.operators).toEqual(['equals', 'gte', 'lte', 'gt', 'lt', 'range'])
  })

  it('rejects paths outside a capability set with the capability named', () => {
    // declared column, but not filterable
    expect(() => contactsRegistry.filterable('Address', 'street_number'))
      .toThrow(new UnknownFieldError('Address', 'street_number', 'filterable'))
    expect(() => contactsRegistry.orderable('AppUser', 'address.street'))
      .toThrow('Field "address.street" is not orderable on AppUser')
    expect(() => contactsRegistry.resolve('AppUser', 'nickname'))
      .toThrow('Unknown field "nickname" on AppUser')
  })

  it('throws UnknownEntityError for an unregistered entity', () => {
    expect(() => contactsRegistry.entity('Order')).toThrow(UnknownEntityError)
  })

  it('lists searchable and name fields in declaration order', () => {
    expect(contactsRegistry.searchable('AppUser').map(f => f.path)).toEqual([
      'first_name', 'last_name', 'customer_id', 'phone_number',
      'address.street', 'address.city', 'address.country',
    ])
    expect(contactsRegistry.nameFields('AppUser').map(f => f.path)).toEqual(['first_name', 'last_name'])
    expect(contactsRegistry.nameFields('Address')).toEqual([])
  })

  it('selects base columns before related ones', () => {
    const paths = contactsRegistry.selectable('CustomerRelationship').map(f => f.path)
    expect(paths.slice(0, 5)).toEqual(['id', 'appuser_id', 'points', 'created', 'last_activity'])
    expect(paths).toContain('appuser.last_name')
  })

  it('exposes resolved fields read-only', () => {
    const field = contactsRegistry.resolve('AppUser', 'address.city')
    expect(Object.isFrozen(field)).toBe(true)
  })
})

describe('SchemaRegistry.create', () => {
  const copy = (def: EntityDefinition, patch: Partial<EntityDefinition>): EntityDefinition => ({ ...def, ...patch })

  it('rejects a relation to an undeclared entity', () => {
    expect(() => SchemaRegistry.create([APP_USER, ADDRESS]))
      .toThrow('AppUser.relationship targets undeclared entity CustomerRelationship')
  })

  it('rejects an operator the field type does not support', () => {
    const bad = copy(ADDRESS, { filterable: { city: ['gte'] } })
    expect(() => SchemaRegistry.create([bad]))
      .toThrow('Address.city: operator gte is not valid for string fields')
  })

  it('rejects a default ordering on a field that is not orderable', () => {
    const bad = copy(ADDRESS, { defaultOrdering: ['-street_number'] })
    expect(() => SchemaRegistry.create([bad]))
      .toThrow('Address: default ordering field street_number is not orderable')
  })

  it('rejects duplicate entities', () => {
    expect(() => SchemaRegistry.create([ADDRESS, ADDRESS])).toThrow('Entity Address declared twice')
  })

  it('accepts the full contacts schema in any order', () => {
    const registry = SchemaRegistry.create([CUSTOMER_RELATIONSHIP, ADDRESS, APP_USER])
    expect(registry.entityNames()).toEqual(['CustomerRelationship', 'Address', 'AppUser'])
  })
})
