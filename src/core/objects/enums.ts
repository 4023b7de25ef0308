// src/core/objects/enums.ts
// Enumerations: classes whose members are named instances

import { declareOrigin } from "./origin";

export type EnumValue = string | number;

const memberTables = new WeakMap<object, Map<string, EnumMember>>();
const enumClasses = new WeakSet<object>();

const RESERVED = new Set(["name", "length", "prototype", "members", "member", "of"]);

export class EnumMember {
  constructor(
    public readonly name: string,
    public readonly value: EnumValue
  ) {}

  static get members(): ReadonlyMap<string, EnumMember> {
    return memberTables.get(this) ?? new Map();
  }

  static member(name: string): EnumMember {
    const found = memberTables.get(this)?.get(name);
    if (!found) throw new RangeError(`${this.name} has no member '${name}'`);
    return found;
  }

  static of(value: EnumValue): EnumMember {
    for (const m of this.members.values()) {
      if (m.value === value) return m;
    }
    throw new RangeError(`${String(value)} is not a valid ${this.name}`);
  }

  toString(): string {
    return `${this.constructor.name}.${this.name}`;
  }
}

export type EnumType = typeof EnumMember;

export function isEnumClass(x: unknown): x is EnumType {
  return typeof x === "function" && enumClasses.has(x);
}

/**
 * A member-less enum class. Members are attached afterwards with addEnumMember().
 */
export function createEnumShell(name: string): EnumType {
  const shell = class extends EnumMember {};
  Object.defineProperty(shell, "name", { value: name });
  enumClasses.add(shell);
  memberTables.set(shell, new Map());
  return shell;
}

/**
 * Member construction: bind the name/value pair, then attach it as a class attribute.
 */
export function addEnumMember(cls: EnumType, name: string, value: EnumValue): EnumMember {
  const table = memberTables.get(cls);
  if (!table) throw new TypeError(`${cls.name} is not an enum`);
  if (RESERVED.has(name)) throw new TypeError(`'${name}' cannot be used as an enum member name`);
  if (table.has(name)) throw new TypeError(`duplicate member '${name}' in ${cls.name}`);

  const member = new cls(name, value);
  table.set(name, member);
  Object.defineProperty(cls, name, { value: member, enumerable: true });
  return member;
}

export function defineEnum(
  name: string,
  members: Record<string, EnumValue>,
  options: { module?: string; qualname?: string } = {}
): EnumType {
  const cls = createEnumShell(name);
  for (const [key, value] of Object.entries(members)) {
    addEnumMember(cls, key, value);
  }
  if (options.module) {
    declareOrigin(cls, { module: options.module, qualname: options.qualname ?? name });
  }
  return cls;
}

export function enumClassOf(member: EnumMember): EnumType | undefined {
  const ctor: unknown = member.constructor;
  return isEnumClass(ctor) ? ctor : undefined;
}
