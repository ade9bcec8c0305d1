/**
 * Tenant ID
 *
 * Hierarchical tenant identifier: `/`-joined tenant names, root first,
 * e.g. `acme/engineering/platform`.
 */

import { InvalidParameterError } from "../errors/IamError";

const SEPARATOR = "/";

export class TenantId {
  private constructor(private readonly value: string) {
    Object.freeze(this);
  }

  /**
   * Wrap an existing `/`-joined id
   */
  static of(value: string): TenantId {
    const segments = value.split(SEPARATOR);
    if (segments.some((segment) => segment === "")) {
      throw new InvalidParameterError(
        `Invalid tenant id '${value}': segments cannot be empty`,
        { tenantId: value },
      );
    }
    return new TenantId(value);
  }

  static root(name: string): TenantId {
    return new TenantId(validSegment(name));
  }

  child(name: string): TenantId {
    return new TenantId(`${this.value}${SEPARATOR}${validSegment(name)}`);
  }

  parent(): TenantId | undefined {
    const cut = this.value.lastIndexOf(SEPARATOR);
    return cut < 0 ? undefined : new TenantId(this.value.slice(0, cut));
  }

  /**
   * Number of separators; a root id has depth 0
   */
  depth(): number {
    return this.value.split(SEPARATOR).length - 1;
  }

  /**
   * Every strict prefix, from the root down to the immediate parent
   */
  ancestors(): TenantId[] {
    const segments = this.segments();
    const ancestors: TenantId[] = [];
    for (let i = 1; i < segments.length; i++) {
      ancestors.push(new TenantId(segments.slice(0, i).join(SEPARATOR)));
    }
    return ancestors;
  }

  isDescendantOf(other: TenantId): boolean {
    return this.value.startsWith(`${other.value}${SEPARATOR}`);
  }

  isAncestorOf(other: TenantId): boolean {
    return other.isDescendantOf(this);
  }

  isRoot(): boolean {
    return !this.value.includes(SEPARATOR);
  }

  segments(): string[] {
    return this.value.split(SEPARATOR);
  }

  equals(other: TenantId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}

function validSegment(name: string): string {
  if (name === "" || name.includes(SEPARATOR)) {
    throw new InvalidParameterError(
      `Invalid tenant id segment '${name}': must be non-empty and contain no '/'`,
      { segment: name },
    );
  }
  return name;
}
