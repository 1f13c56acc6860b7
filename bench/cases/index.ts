import { benchConfig } from '../../configs/bench'
import type { BenchmarkScenario } from '../../src/harness/types'

export interface CaseSamples {
  firstName: string
  city:      string
}

// ------------------------------------------------------------------
// Case definitions
// ------------------------------------------------------------------

/** The contacts list workload; every case pages through AppUser with `pageSize` rows. */
export function buildCases(
  samples:  CaseSamples = benchConfig.samples,
  pageSize: number      = benchConfig.pageSize,
): BenchmarkScenario[] {
  const page = { page_size: String(pageSize) }

  return [
    // ── List ─────────────────────────────────────────────────────────

    {
      name:        'initial_list',
      description: 'First page, default ordering (-created)',
      entity:      'AppUser',
      params:      { ...page },
    },

    // ── Filter ───────────────────────────────────────────────────────

    {
      name:        'filter_by_name',
      description: `first_name ILIKE '%${samples.firstName}%'`,
      entity:      'AppUser',
      params:      { first_name__icontains: samples.firstName, ...page },
    },
    {
      name:        'multiple_filters',
      description: 'gender=M, relationship.points >= 5000, address.country ILIKE %United%',
      entity:      'AppUser',
      params: {
        gender:                      'M',
        relationship__points__gte:   '5000',
        address__country__icontains: 'United',
        ...page,
      },
    },

    // ── Sort ─────────────────────────────────────────────────────────

    {
      name:        'sort_created_desc',
      description: 'ORDER BY created DESC',
      entity:      'AppUser',
      params:      { ordering: '-created', ...page },
    },
    {
      name:        'sort_points',
      description: 'ORDER BY relationship.points (join)',
      entity:      'AppUser',
      params:      { ordering: 'relationship__points', ...page },
    },
    {
      name:        'sort_city',
      description: 'ORDER BY address.city (join)',
      entity:      'AppUser',
      params:      { ordering: 'address__city', ...page },
    },
    {
      name:        'multi_sort_points_name',
      description: 'ORDER BY relationship.points DESC, last_name, first_name',
      entity:      'AppUser',
      params:      { ordering: '-relationship__points,last_name,first_name', ...page },
    },
    {
      name:        'multi_sort_location_created',
      description: 'ORDER BY address.country, address.city, created DESC',
      entity:      'AppUser',
      params:      { ordering: 'address__country,address__city,-created', ...page },
    },

    // ── Combined ─────────────────────────────────────────────────────

    {
      name:        'filter_and_sort',
      description: `address.city ILIKE '%${samples.city}%' ORDER BY relationship.points DESC`,
      entity:      'AppUser',
      params: {
        address__city__icontains: samples.city,
        ordering:                 '-relationship__points',
        ...page,
      },
    },
    {
      name:        'search',
      description: `search='${samples.firstName}' across name, customer id, phone and address`,
      entity:      'AppUser',
      params:      { search: samples.firstName, ...page },
    },
    {
      name:        'complex_query',
      description: 'gender=M, points >= 1000, country ILIKE %United%, ORDER BY last_activity DESC',
      entity:      'AppUser',
      params: {
        gender:                      'M',
        relationship__points__gte:   '1000',
        address__country__icontains: 'United',
        ordering:                    '-relationship__last_activity',
        ...page,
      },
    },

    // ── Pagination ───────────────────────────────────────────────────

    {
      name:        'pagination_selected_pages',
      description: 'First, middle, last and random pages of the default list',
      entity:      'AppUser',
      params:      { ...page },
      repetitions: 1,
      variants:    ['first', 'middle', 'last', 'random'],
    },
  ]
}

export const cases: BenchmarkScenario[] = buildCases()

export const caseMap: Record<string, BenchmarkScenario> = Object.fromEntries(cases.map(c => [c.name, c]))
