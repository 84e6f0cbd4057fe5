import type { DepartmentMappingEntry, DepartmentResolution } from '../types/index.js';

/**
 * Lower-cased author name → departments listed for that author (blank ones dropped).
 * An author present with only blank departments still maps to an empty list, which
 * counts as found.
 */
export type DepartmentIndex = ReadonlyMap<string, readonly string[]>;

export function buildDepartmentIndex(mapping: readonly DepartmentMappingEntry[]): DepartmentIndex {
    const index = new Map<string, string[]>();

    for (const entry of mapping) {
        const key = entry.authorName.trim().toLowerCase();
        if (!key) continue;

        const departments = index.get(key) ?? [];
        const department = entry.department?.trim();
        if (department) departments.push(department);
        index.set(key, departments);
    }

    return index;
}

/**
 * Map "; "-separated short author names to departments.
 *
 * Departments are deduplicated in order of first occurrence. Any author missing from the
 * table flags the record as `not_found`; otherwise more than one department flags it as
 * `multiple`.
 */
export function resolveDepartments(
    authors: string | null | undefined,
    mapping: readonly DepartmentMappingEntry[] | DepartmentIndex
): DepartmentResolution {
    if (!authors || !authors.trim()) {
        return { department: '', departments: [], unresolvedAuthors: [], reason: 'none', needsHighlight: false };
    }

    const index = isDepartmentIndex(mapping) ? mapping : buildDepartmentIndex(mapping);
    const names = authors.split(';').map((a) => a.trim()).filter((a) => a.length > 0);

    const found: string[] = [];
    const unresolvedAuthors: string[] = [];

    for (const name of names) {
        const departments = index.get(name.toLowerCase());
        if (departments === undefined) {
            unresolvedAuthors.push(name);
        } else {
            found.push(...departments);
        }
    }

    const departments = [...new Set(found)];
    const department = departments.join('; ');

    if (unresolvedAuthors.length > 0) {
        return { department, departments, unresolvedAuthors, reason: 'not_found', needsHighlight: true };
    }
    if (departments.length > 1) {
        return { department, departments, unresolvedAuthors, reason: 'multiple', needsHighlight: true };
    }
    return { department, departments, unresolvedAuthors, reason: 'none', needsHighlight: false };
}

function isDepartmentIndex(
    value: readonly DepartmentMappingEntry[] | DepartmentIndex
): value is DepartmentIndex {
    return value instanceof Map;
}
