import type { Role } from './Ontology.js';
import { LIMITS } from './Ontology.js';

/**
 * Fixed-capacity role list for one (user, delivery) key.
 * Duplicates are kept: assigning a role twice takes two slots.
 */
export class RoleSet {
    private constructor(private readonly roles: readonly Role[]) { }

    public static empty(): RoleSet {
        return new RoleSet([]);
    }

    public static of(...roles: Role[]): RoleSet {
        if (roles.length > RoleSet.capacity) {
            throw new Error(`RoleSet Violation: ${roles.length} roles exceed capacity ${RoleSet.capacity}`);
        }
        return new RoleSet(Object.freeze([...roles]));
    }

    public static get capacity(): number {
        return LIMITS.rolesPerAssignment;
    }

    public get size(): number { return this.roles.length; }

    public get isFull(): boolean { return this.roles.length >= RoleSet.capacity; }

    public has(role: Role): boolean {
        return this.roles.includes(role);
    }

    public with(role: Role): RoleSet {
        return RoleSet.of(...this.roles, role);
    }

    /**
     * Drops every occurrence of `role`.
     */
    public without(role: Role): RoleSet {
        return RoleSet.of(...this.roles.filter(r => r !== role));
    }

    public toArray(): Role[] {
        return [...this.roles];
    }
}
