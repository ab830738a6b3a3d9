/**
 * Entitle Catalog — Definition Validator
 *
 * Validates the raw catalog data file before any ServiceDefinition is
 * constructed from it. Every field is checked structurally; cross-references
 * between services (required_services) must point at defined names.
 *
 * The validator never throws: callers receive a ValidationResult and decide
 * how to surface the errors (loadCatalog throws CatalogValidationError).
 */

import type {
  ServiceDefinition,
  ValidationError,
  ValidationResult,
} from './types.js';

// ---------------------------------------------------------------------------
// Narrowing helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isAvailabilityMap(value: unknown): value is Record<string, boolean> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === 'boolean');
}

const STRING_FIELDS = ['name', 'title', 'description', 'help_text'] as const;
const BOOLEAN_FIELDS = [
  'is_beta',
  'enable_by_default',
  'reboot_on_enable',
  'container_supported',
] as const;

// ---------------------------------------------------------------------------
// Single definition
// ---------------------------------------------------------------------------

/**
 * Validate one raw entry of the `services` array.
 *
 * @param raw - Untrusted entry parsed from JSON
 * @param index - Position in the array, used for error context
 */
export function validateServiceDefinition(
  raw: unknown,
  index: number,
): ValidationResult<ServiceDefinition> {
  const at = `services[${index}]`;
  if (!isRecord(raw)) {
    return { ok: false, errors: [{ message: 'Service entry must be an object.', context: at }] };
  }

  const errors: ValidationError[] = [];
  for (const field of STRING_FIELDS) {
    const value = raw[field];
    if (typeof value !== 'string' || value.trim() === '') {
      errors.push({ message: `"${field}" must be a non-empty string.`, context: `${at}.${field}` });
    }
  }
  for (const field of BOOLEAN_FIELDS) {
    if (typeof raw[field] !== 'boolean') {
      errors.push({ message: `"${field}" must be a boolean.`, context: `${at}.${field}` });
    }
  }

  const name = raw['name'];
  const title = raw['title'];
  const description = raw['description'];
  const helpText = raw['help_text'];
  const availability = raw['available_by_release'];
  const required = raw['required_services'];
  const isBeta = raw['is_beta'];
  const enableByDefault = raw['enable_by_default'];
  const rebootOnEnable = raw['reboot_on_enable'];
  const containerSupported = raw['container_supported'];

  if (!isAvailabilityMap(availability)) {
    errors.push({
      message: '"available_by_release" must map series names to booleans.',
      context: `${at}.available_by_release`,
    });
  }
  if (!isStringArray(required)) {
    errors.push({
      message: '"required_services" must be an array of service names.',
      context: `${at}.required_services`,
    });
  }

  if (
    errors.length > 0 ||
    typeof name !== 'string' ||
    typeof title !== 'string' ||
    typeof description !== 'string' ||
    typeof helpText !== 'string' ||
    typeof isBeta !== 'boolean' ||
    typeof enableByDefault !== 'boolean' ||
    typeof rebootOnEnable !== 'boolean' ||
    typeof containerSupported !== 'boolean' ||
    !isAvailabilityMap(availability) ||
    !isStringArray(required)
  ) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    value: {
      name,
      title,
      description,
      help_text: helpText,
      available_by_release: { ...availability },
      is_beta: isBeta,
      enable_by_default: enableByDefault,
      required_services: [...required],
      reboot_on_enable: rebootOnEnable,
      container_supported: containerSupported,
    },
  };
}

// ---------------------------------------------------------------------------
// Whole catalog
// ---------------------------------------------------------------------------

/**
 * Validate the parsed catalog document `{ services: [...] }`.
 *
 * Beyond per-entry checks this rejects duplicate names, references to
 * undefined required services, and cycles among required services
 * (including a service requiring itself).
 */
export function validateCatalogData(
  data: unknown,
): ValidationResult<ReadonlyArray<ServiceDefinition>> {
  if (!isRecord(data) || !Array.isArray(data['services'])) {
    return {
      ok: false,
      errors: [{ message: 'Catalog must be an object with a "services" array.' }],
    };
  }

  const entries: unknown[] = data['services'];
  const errors: ValidationError[] = [];
  const definitions: ServiceDefinition[] = [];
  entries.forEach((raw, index) => {
    const result = validateServiceDefinition(raw, index);
    if (result.ok) {
      definitions.push(result.value);
    } else {
      errors.push(...result.errors);
    }
  });

  const seen = new Set<string>();
  for (const def of definitions) {
    if (seen.has(def.name)) {
      errors.push({ message: `Duplicate service name "${def.name}".` });
    }
    seen.add(def.name);
  }
  for (const def of definitions) {
    for (const req of def.required_services) {
      if (req === def.name) {
        errors.push({ message: `Service "${def.name}" cannot require itself.` });
      } else if (!seen.has(req)) {
        errors.push({ message: `Service "${def.name}" requires undefined service "${req}".` });
      }
    }
  }

  errors.push(...requirementCycles(definitions));

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, value: definitions };
}

/** Depth-first search over required_services; one error per cycle found. */
function requirementCycles(definitions: ReadonlyArray<ServiceDefinition>): ValidationError[] {
  const requires = new Map<string, ReadonlyArray<string>>();
  for (const def of definitions) {
    requires.set(def.name, def.required_services.filter((r) => r !== def.name));
  }

  const errors: ValidationError[] = [];
  const done = new Set<string>();
  const path: string[] = [];

  const visit = (name: string): void => {
    if (done.has(name)) return;
    const start = path.indexOf(name);
    if (start !== -1) {
      const cycle = [...path.slice(start), name];
      errors.push({ message: `Services form a required_services cycle: ${cycle.join(' -> ')}.` });
      return;
    }
    path.push(name);
    for (const req of requires.get(name) ?? []) visit(req);
    path.pop();
    done.add(name);
  };

  for (const def of definitions) visit(def.name);
  return errors;
}
