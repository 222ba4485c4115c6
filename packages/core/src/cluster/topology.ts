/**
 * Cluster Topology
 * Maps 1-based host indexes of a named cluster to host names and targets
 */

import type { ClusterSettings } from "../config/types.js";
import type { HostResolver } from "../exec/types.js";
import type { Target } from "../types/common.js";

/**
 * Render a host template for one index.
 * `{index:04}` pads with zeros to four digits.
 */
export function renderHostTemplate(template: string, name: string, index: number): string {
  return template
    .replace(/\{name\}/g, name)
    .replace(/\{index(?::0(\d+))?\}/g, (_match, width?: string) =>
      width ? String(index).padStart(Number(width), "0") : String(index)
    );
}

export class ClusterTopology {
  public readonly name: string;
  public readonly count: number;
  public readonly user: string;
  private readonly hostTemplate: string;

  constructor(settings: ClusterSettings, user: string) {
    this.name = settings.name;
    this.count = settings.count;
    this.hostTemplate = settings.hostTemplate;
    this.user = user;
  }

  /**
   * Host name for a 1-based index. Indexes past `count` are allowed
   * (auxiliary hosts such as a load generator).
   */
  public host(index: number): string {
    if (!Number.isInteger(index) || index < 1) {
      throw new RangeError(`Invalid host index: ${index}`);
    }
    return renderHostTemplate(this.hostTemplate, this.name, index);
  }

  public target(index: number): Target {
    return { user: this.user, host: this.host(index) };
  }

  /**
   * Index to host resolver for the parallel executor
   */
  public resolver(): HostResolver {
    return (index) => this.host(index);
  }
}
