/**
 * Jobcode hierarchy
 *
 * Jobcodes form a forest through `parent_id` (0 = top level). The tree is an
 * id-indexed arena; walks are iterative and stop on a revisited id, so a
 * cycle in upstream data cannot loop forever.
 */

import type { Jobcode, JobcodeType, JobcodeTypeFilter } from '../qbtime/types.js';

export interface JobcodeNode {
  id: number;
  name: string;
  type: JobcodeType;
  active: boolean;
  billable: boolean;
  children: JobcodeNode[];
}

export class JobcodeTree {
  private byId = new Map<number, Jobcode>();
  private children = new Map<number, number[]>();

  constructor(jobcodes: readonly Jobcode[]) {
    for (const jobcode of jobcodes) {
      this.byId.set(jobcode.id, jobcode);
    }
    for (const jobcode of jobcodes) {
      const siblings = this.children.get(jobcode.parent_id) ?? [];
      siblings.push(jobcode.id);
      this.children.set(jobcode.parent_id, siblings);
    }
  }

  get(id: number): Jobcode | undefined {
    return this.byId.get(id);
  }

  all(): Jobcode[] {
    return [...this.byId.values()];
  }

  /**
   * The jobcode and its known ancestors, leaf first
   */
  ancestors(id: number): Jobcode[] {
    const chain: Jobcode[] = [];
    const visited = new Set<number>();
    let current = this.byId.get(id);
    while (current && !visited.has(current.id)) {
      visited.add(current.id);
      chain.push(current);
      current = current.parent_id === 0 ? undefined : this.byId.get(current.parent_id);
    }
    return chain;
  }

  /**
   * Type inherited down the tree: the nearest jobcode (itself first) whose
   * own type is not `regular` decides it
   */
  effectiveType(id: number): JobcodeType {
    const decisive = this.ancestors(id).find((jobcode) => jobcode.type !== 'regular');
    return decisive?.type ?? 'regular';
  }

  matchesType(id: number, filter: JobcodeTypeFilter): boolean {
    return filter === 'all' || this.effectiveType(id) === filter;
  }

  isDoubleTime(id: number): boolean {
    return this.ancestors(id).some((jobcode) => jobcode.double_time === true);
  }

  /**
   * Top-level ancestor (the client, in a client › project layout)
   */
  root(id: number): Jobcode | undefined {
    const chain = this.ancestors(id);
    return chain[chain.length - 1];
  }

  /**
   * Names from the top level down, e.g. "Acme › Website › Design"
   */
  path(id: number): string {
    const chain = this.ancestors(id);
    if (chain.length === 0) return `Jobcode ${id}`;
    return chain.map((jobcode) => jobcode.name).reverse().join(' › ');
  }

  /**
   * The jobcode and every jobcode below it
   */
  descendants(id: number): number[] {
    const found: number[] = [];
    const visited = new Set<number>();
    const queue = [id];
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || visited.has(next)) continue;
      visited.add(next);
      found.push(next);
      queue.push(...(this.children.get(next) ?? []));
    }
    return found;
  }

  /**
   * Nested view of the forest. A jobcode whose parent is missing from the
   * set is shown at the top level.
   */
  hierarchy(): JobcodeNode[] {
    const visited = new Set<number>();
    const build = (jobcode: Jobcode): JobcodeNode => {
      visited.add(jobcode.id);
      const children = (this.children.get(jobcode.id) ?? [])
        .filter((id) => !visited.has(id))
        .map((id) => this.byId.get(id))
        .filter((child): child is Jobcode => child !== undefined)
        .map(build);
      return {
        id: jobcode.id,
        name: jobcode.name,
        type: jobcode.type,
        active: jobcode.active,
        billable: jobcode.billable,
        children,
      };
    };
    return this.all()
      .filter((jobcode) => jobcode.parent_id === 0 || !this.byId.has(jobcode.parent_id))
      .map(build);
  }
}
