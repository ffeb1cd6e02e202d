import { defineTable } from '../../src/schema/table.js';
import { col } from '../../src/schema/column-types.js';

export const Employees = defineTable('company', 'employees', {
  id: col.int(),
  name: col.string(),
  age: col.int(),
  salary: col.double(),
  department_id: col.int(),
  active: col.boolean(),
  hired_on: col.date()
});

export const Departments = defineTable('company', 'departments', {
  dept_id: col.int(),
  title: col.string(),
  budget: col.long()
});

export const Teams = defineTable('company', 'teams', {
  team_id: col.int(),
  name: col.string()
});

export const People = defineTable('company', 'people', {
  id: col.int(),
  name: col.string(),
  age: col.int()
});
