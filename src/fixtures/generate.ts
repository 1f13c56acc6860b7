import { faker } from '@faker-js/faker'
import type {
  AddressRecord, AppUserRecord, ContactsDataset, CustomerRelationshipRecord,
} from '../types'

export interface DatasetSize {
  users:     number
  addresses: number
}

export interface GenerateOptions {
  /** Seeds faker so the same size and seed give the same rows. */
  seed?: number
  /** Latest timestamp any generated row may carry. */
  now?:  Date
  /** Share of users that get a customer relationship. */
  relationshipRatio?: number
}

const GENDERS = ['M', 'F', 'O'] as const

/** UTC midnight of the given instant's day; `birthday` is a DATE column. */
export function calendarDay(instant: Date): Date {
  return new Date(instant.toISOString().slice(0, 10))
}

export function customerId(): string {
  return `CUST-${faker.string.hexadecimal({ length: 12, casing: 'upper', prefix: '' })}`
}

export function generateAddresses(count: number): AddressRecord[] {
  return Array.from({ length: count }, (_, i) => ({
    id:            i + 1,
    street:        faker.location.street(),
    street_number: faker.location.buildingNumber(),
    city_code:     faker.location.zipCode(),
    city:          faker.location.city(),
    country:       faker.location.country(),
  }))
}

export function generateUsers(count: number, addressCount: number, now: Date): AppUserRecord[] {
  return Array.from({ length: count }, (_, i) => {
    const created = faker.date.past({ years: 3, refDate: now })
    return {
      id:           i + 1,
      first_name:   faker.person.firstName(),
      last_name:    faker.person.lastName(),
      gender:       faker.helpers.maybe(() => faker.helpers.arrayElement(GENDERS), { probability: 0.95 }) ?? null,
      customer_id:  customerId(),
      phone_number: faker.helpers.maybe(() => faker.phone.number().slice(0, 20), { probability: 0.8 }) ?? null,
      created,
      address_id:   addressCount > 0
        ? faker.helpers.maybe(() => faker.number.int({ min: 1, max: addressCount }), { probability: 0.9 }) ?? null
        : null,
      birthday:     faker.helpers.maybe(() => calendarDay(faker.date.birthdate({ min: 18, max: 90, mode: 'age', refDate: now })), { probability: 0.7 }) ?? null,
      last_updated: faker.date.between({ from: created, to: now }),
    }
  })
}

export function generateRelationships(users: readonly AppUserRecord[], ratio: number, now: Date): CustomerRelationshipRecord[] {
  const records: CustomerRelationshipRecord[] = []
  for (const user of users) {
    if (faker.number.float({ min: 0, max: 1 }) >= ratio) continue
    const created = faker.date.between({ from: user.created, to: now })
    records.push({
      id:            records.length + 1,
      appuser_id:    user.id,
      points:        faker.number.int({ min: 0, max: 10_000 }),
      created,
      last_activity: faker.date.between({ from: created, to: now }),
    })
  }
  return records
}

export function generateDataset(size: DatasetSize, options: GenerateOptions = {}): ContactsDataset {
  if (options.seed !== undefined) faker.seed(options.seed)
  const now = options.now ?? new Date()

  const address = generateAddresses(size.addresses)
  const appuser = generateUsers(size.users, size.addresses, now)
  return {
    address,
    appuser,
    customer_relationship: generateRelationships(appuser, options.relationshipRatio ?? 0.9, now),
  }
}
