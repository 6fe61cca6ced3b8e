export interface FlagMember {
  readonly name: string;
  readonly value: number;
}

export type FlagTable = readonly FlagMember[];

export interface FlagDecomposition {
  readonly members: FlagMember[];
  /** Set bits that no member of the table accounts for. */
  readonly notCovered: number;
}

const MAX_FLAG_VALUE = 0xffffffff;

function assertFlagValue(value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_FLAG_VALUE) {
    throw new RangeError(`Flag value out of unsigned 32-bit range: ${value}`);
  }
}

function isContained(member: number, value: number): boolean {
  return ((member & value) >>> 0) === member;
}

function findByValue(table: FlagTable, value: number): FlagMember | undefined {
  return table.find((member) => member.value === value);
}

export function decomposeFlags(table: FlagTable, value: number): FlagDecomposition {
  assertFlagValue(value);
  for (const member of table) assertFlagValue(member.value);

  if (value !== 0) {
    const exact = findByValue(table, value);
    if (exact) return { members: [exact], notCovered: 0 };
  }

  const members: FlagMember[] = [];
  let notCovered = value;

  // Greedy over the remaining bits, widest member first. Single-bit members are
  // part of the same walk, so no bit left uncovered afterwards has a name.
  const byValue = [...table].sort((a, b) => b.value - a.value);
  for (const member of byValue) {
    if (member.value !== 0 && isContained(member.value, notCovered)) {
      members.push(member);
      notCovered = (notCovered & ~member.value) >>> 0;
    }
  }

  return { members, notCovered };
}

/** Unique member names of `value`, in decomposition order. */
export function flagNames(table: FlagTable, value: number): string[] {
  const { members } = decomposeFlags(table, value);
  return [...new Set(members.map((member) => member.name))];
}
