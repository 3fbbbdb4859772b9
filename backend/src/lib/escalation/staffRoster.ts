import { z } from 'zod';
import roster from '../../data/staff.json';

const StaffMemberSchema = z.object({
  id: z.number().int().positive(),
  name: z.string().min(1),
  department: z.string().min(1),
  available: z.boolean().default(true),
});

const StaffRosterSchema = z.object({ staff: z.array(StaffMemberSchema) });

export type StaffMember = z.infer<typeof StaffMemberSchema>;

/** Human staff who take over escalated conversations, grouped by department. */
export class StaffRoster {
  private readonly staff: StaffMember[];

  constructor(raw: unknown = roster) {
    this.staff = StaffRosterSchema.parse(raw).staff;
  }

  /** First available member of the department, in roster order. */
  pickFor(department: string): StaffMember | null {
    return this.staff.find((member) => member.available && member.department === department) ?? null;
  }

  getById(id: number): StaffMember | null {
    return this.staff.find((member) => member.id === id) ?? null;
  }
}
