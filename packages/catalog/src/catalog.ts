/**
 * Entitle Catalog — Service Catalog
 *
 * The ServiceCatalog is the authoritative, immutable record of every
 * service the CLI knows about. It is built once from validated definitions
 * and shared read-only for the rest of the invocation.
 *
 * Lookups are exact and case-sensitive. There are no aliases: a name is
 * either a catalog key or unknown.
 */

import type { ReleaseSeries, ServiceDefinition } from './types.js';

export interface ListOptions {
  /** Include beta services. Default: false. */
  readonly includeBeta?: boolean | undefined;
}

/**
 * Immutable keyed collection of service definitions.
 *
 * Iteration order is the order of the definitions passed to the
 * constructor (the data file keeps them sorted by name).
 */
export class ServiceCatalog {
  private readonly entries: ReadonlyMap<string, ServiceDefinition>;

  /**
   * @param definitions - Validated definitions (see validateCatalogData)
   * @throws {Error} If two definitions share a name
   */
  constructor(definitions: ReadonlyArray<ServiceDefinition>) {
    const entries = new Map<string, ServiceDefinition>();
    for (const def of definitions) {
      if (entries.has(def.name)) {
        throw new Error(`Service already defined: ${def.name}. Duplicate names are not permitted.`);
      }
      entries.set(def.name, Object.freeze({ ...def }));
    }
    this.entries = entries;
  }

  get(name: string): ServiceDefinition | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  list(opts?: ListOptions): ReadonlyArray<ServiceDefinition> {
    const includeBeta = opts?.includeBeta === true;
    return Array.from(this.entries.values()).filter((d) => includeBeta || !d.is_beta);
  }

  names(opts?: ListOptions): ReadonlyArray<string> {
    return this.list(opts).map((d) => d.name);
  }

  /**
   * Whether the service can be enabled on the given series.
   * Unknown services and series missing from the map are unavailable.
   */
  isAvailable(name: string, series: ReleaseSeries): boolean {
    return this.entries.get(name)?.available_by_release[series] === true;
  }

  /** Services whose required_services include `name`, in catalog order. */
  dependentsOf(name: string): ReadonlyArray<string> {
    return Array.from(this.entries.values())
      .filter((d) => d.required_services.includes(name))
      .map((d) => d.name);
  }

  /** Services enabled automatically on attach, in catalog order. */
  defaultEnabled(): ReadonlyArray<string> {
    return Array.from(this.entries.values())
      .filter((d) => d.enable_by_default)
      .map((d) => d.name);
  }

  /**
   * Order `names` so that every service comes after the services it
   * requires. Only names present in the input are returned; relative order
   * is otherwise preserved.
   */
  enableOrder(names: ReadonlyArray<string>): ReadonlyArray<string> {
    return this.sortBy(names, (name) => this.entries.get(name)?.required_services ?? []);
  }

  /**
   * Order `names` so that every service comes after the services that
   * depend on it (dependents are disabled first).
   */
  disableOrder(names: ReadonlyArray<string>): ReadonlyArray<string> {
    return this.sortBy(names, (name) => this.dependentsOf(name));
  }

  private sortBy(
    names: ReadonlyArray<string>,
    before: (name: string) => ReadonlyArray<string>,
  ): ReadonlyArray<string> {
    const wanted = new Set(names);
    const visited = new Set<string>();
    const order: string[] = [];

    const visit = (name: string): void => {
      if (visited.has(name)) return;
      visited.add(name);
      for (const prior of before(name)) {
        if (wanted.has(prior)) visit(prior);
      }
      order.push(name);
    };

    for (const name of names) visit(name);
    return order;
  }
}
