import pool, { withTransaction } from '../config/database';
import { Role } from '../types';

/*
  Seed data for local runs:
  - one HR officer and one manager per department
  - a handful of employees in Engineering and Finance
  - a performance rating for everyone for the previous month
*/

type SeedEmployee = [name: string, role: Role, department: string, leaveBalance: number];

const EMPLOYEES: SeedEmployee[] = [
  ['Hana Officer', 'hr', 'People', 20],
  ['Mark Lead', 'manager', 'Engineering', 18],
  ['Fiona Lead', 'manager', 'Finance', 18],
  ['Eli Dev', 'employee', 'Engineering', 12],
  ['Ada Dev', 'employee', 'Engineering', 12],
  ['Theo Dev', 'employee', 'Engineering', 4],
  ['Nina Ledger', 'employee', 'Finance', 12],
  ['Omar Ledger', 'employee', 'Finance', 0],
];

function previousMonth(now: Date): string {
  const d = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() - 1, 1));
  return d.toISOString().slice(0, 7);
}

async function seed() {
  try {
    await withTransaction(async (client) => {
      // ── Clear existing data ────────────────────────────────────────────────
      await client.query(
        `TRUNCATE notifications, role_changes, performance_ratings, salary_records,
                  leave_applications, leave_requests, attendance_records, employees
         RESTART IDENTITY CASCADE`
      );

      // ── Employees ──────────────────────────────────────────────────────────
      const ids: number[] = [];
      for (const [name, role, department, leaveBalance] of EMPLOYEES) {
        const result = await client.query<{ id: number }>(
          `INSERT INTO employees (name, role, department, leave_balance)
           VALUES ($1, $2, $3, $4) RETURNING id`,
          [name, role, department, leaveBalance]
        );
        ids.push(result.rows[0].id);
      }

      // ── Ratings ────────────────────────────────────────────────────────────
      const month = previousMonth(new Date());
      for (const [index, id] of ids.entries()) {
        await client.query(
          'INSERT INTO performance_ratings (employee_id, month, rating) VALUES ($1, $2, $3)',
          [id, month, 3 + (index % 3)]
        );
      }
    });

    console.log(`[Seed] Inserted ${EMPLOYEES.length} employees with ratings`);
  } catch (err) {
    console.error('[Seed] Seeding failed:', err);
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

void seed();
