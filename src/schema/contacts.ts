import { SchemaRegistry } from './registry'
import type { EntityDefinition } from './types'

// Numeric and date comparisons; range is accepted wherever these are.
const COMPARE = ['equals', 'gte', 'lte', 'gt', 'lt', 'range'] as const

export const ADDRESS: EntityDefinition = {
  name:       'Address',
  table:      'address',
  primaryKey: 'id',
  columns: {
    id:            'int',
    street:        'string',
    street_number: 'string',
    city_code:     'string',
    city:          'string',
    country:       'string',
  },
  relations: [],
  filterable: {
    id:        ['equals'],
    street:    ['equals', 'contains'],
    city:      ['equals', 'contains'],
    city_code: ['equals', 'contains'],
    country:   ['equals', 'contains'],
  },
  orderable:       ['id', 'street', 'city', 'city_code', 'country'],
  searchable:      ['street', 'city', 'country'],
  defaultOrdering: ['id'],
}

export const APP_USER: EntityDefinition = {
  name:       'AppUser',
  table:      'appuser',
  primaryKey: 'id',
  columns: {
    id:           'int',
    first_name:   'string',
    last_name:    'string',
    gender:       'string',
    customer_id:  'string',
    phone_number: 'string',
    created:      'date',
    address_id:   'int',
    birthday:     'date',
    last_updated: 'date',
  },
  relations: [
    { name: 'address',      target: 'Address',              table: 'address',               localColumn: 'address_id', targetColumn: 'id' },
    { name: 'relationship', target: 'CustomerRelationship', table: 'customer_relationship', localColumn: 'id',         targetColumn: 'appuser_id' },
  ],
  filterable: {
    'id':                         ['equals'],
    'first_name':                 ['contains'],
    'last_name':                  ['contains'],
    'gender':                     ['equals'],
    'customer_id':                ['contains'],
    'phone_number':               ['equals', 'contains'],
    'created':                    COMPARE,
    'birthday':                   ['equals', 'gte', 'lte', 'range'],
    'last_updated':               COMPARE,
    'address.id':                 ['equals', 'isnull'],
    'address.street':             ['equals', 'contains'],
    'address.city':               ['equals', 'contains'],
    'address.city_code':          ['equals', 'contains'],
    'address.country':            ['equals', 'contains'],
    'relationship.id':            ['isnull'],
    'relationship.points':        COMPARE,
    'relationship.created':       COMPARE,
    'relationship.last_activity': COMPARE,
  },
  orderable: [
    'id', 'first_name', 'last_name', 'gender', 'customer_id',
    'phone_number', 'created', 'birthday', 'last_updated',
    'address.city', 'address.country', 'address.city_code',
    'relationship.points', 'relationship.created', 'relationship.last_activity',
  ],
  searchable: [
    'first_name', 'last_name', 'customer_id', 'phone_number',
    'address.street', 'address.city', 'address.country',
  ],
  nameFields:      ['first_name', 'last_name'],
  defaultOrdering: ['-created'],
}

export const CUSTOMER_RELATIONSHIP: EntityDefinition = {
  name:       'CustomerRelationship',
  table:      'customer_relationship',
  primaryKey: 'id',
  columns: {
    id:            'int',
    appuser_id:    'int',
    points:        'int',
    created:       'date',
    last_activity: 'date',
  },
  relations: [
    { name: 'appuser', target: 'AppUser', table: 'appuser', localColumn: 'appuser_id', targetColumn: 'id' },
  ],
  filterable: {
    'id':                  ['equals'],
    'points':              COMPARE,
    'created':             COMPARE,
    'last_activity':       COMPARE,
    'appuser.id':          ['equals'],
    'appuser.customer_id': ['equals', 'contains'],
    'appuser.last_name':   ['contains'],
  },
  orderable:       ['id', 'points', 'created', 'last_activity', 'appuser.last_name'],
  searchable:      ['appuser.first_name', 'appuser.last_name', 'appuser.customer_id'],
  defaultOrdering: ['-created'],
}

/** Process-wide registry for the contacts schema. */
export const contactsRegistry = SchemaRegistry.create([APP_USER, ADDRESS, CUSTOMER_RELATIONSHIP])
