/**
 * Quick Start Example
 *
 * This example demonstrates the most basic usage of sortkit. It shows how to:
 * - Sort with a built-in comparator
 * - Flip the order by passing a different comparator
 * - Sort pairs with lexicographic composition
 * - Build a multi-key ordering for records
 * - Sort with a comparator registered by name
 */

import {
  mergeSort,
  compareNumbers,
  compareStrings,
  composeLexicographic,
  descending,
  orderingFor,
  registerComparator,
  sortBy,
} from '../src/index'

// Plain numbers, ascending and descending
const numbers = [1, 5, -2, 12]

console.log('Ascending: ', mergeSort(numbers, compareNumbers))
console.log('Descending:', mergeSort(numbers, descending(compareNumbers)))

// Pairs: first component decides, second breaks ties
const stock: Array<[number, string]> = [
  [3, 'banana'],
  [1, 'orange'],
  [1, 'apple'],
]

console.log(
  'Pairs:',
  mergeSort(stock, composeLexicographic(compareNumbers, compareStrings))
)

// Records with several keys
interface Employee {
  name: string
  team: string
  salary: number
  manager?: string
}

const employees: Employee[] = [
  { name: 'Ines', team: 'platform', salary: 7200, manager: 'Olu' },
  { name: 'Tariq', team: 'design', salary: 6100 },
  { name: 'Mei', team: 'platform', salary: 8100, manager: 'Olu' },
  { name: 'Jonas', team: 'design', salary: 6100, manager: 'Rhea' },
]

// Team A-Z, best paid first, then by name
const byTeamAndPay = orderingFor<Employee>()
  .by('team')
  .by('salary', { order: 'desc' })
  .by('name')
  .build()

console.log('\nBy team and pay:')
for (const e of mergeSort(employees, byTeamAndPay)) {
  console.log(`  ${e.team.padEnd(10)} ${String(e.salary).padStart(6)}  ${e.name}`)
}

// Equal keys keep their input order (stable), unless the right side wins ties
const bySalary = orderingFor<Employee>().by('salary').build()

console.log(
  '\nStable:       ',
  mergeSort(employees, bySalary).map((e) => e.name)
)
console.log(
  'Right-biased: ',
  mergeSort(employees, bySalary, { tieBreak: 'right' }).map((e) => e.name)
)

// Comparators can be registered and looked up by name
registerComparator('manager', orderingFor<Employee>().by('manager').build())

console.log(
  '\nBy manager (missing last):',
  sortBy(employees, 'manager').map((e) => `${e.name} (${e.manager ?? '-'})`)
)
