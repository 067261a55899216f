import { BadResourceError } from "../errors/catalog.js";

export type ResourceId = number;

export interface Resource {
  /** Kind tag, e.g. "tcpListener" or "unixStream". */
  readonly name: string;
  close(): void;
}

/**
 * Id-keyed store of live resources (listeners, streams).
 *
 * `take` transfers ownership: the entry is removed, so of two callers
 * taking the same id exactly one succeeds.
 */
export class ResourceTable {
  private readonly resources = new Map<ResourceId, Resource>();
  private nextRid: ResourceId = 0;

  get size(): number {
    return this.resources.size;
  }

  add(resource: Resource): ResourceId {
    const rid = this.nextRid++;
    this.resources.set(rid, resource);
    return rid;
  }

  has(rid: ResourceId): boolean {
    return this.resources.has(rid);
  }

  /** Borrows a resource without removing it. */
  get<T extends Resource>(
    rid: ResourceId,
    guard: (resource: Resource) => resource is T,
    expected?: string,
  ): T {
    const resource = this.resources.get(rid);
    if (resource === undefined) {
      throw new BadResourceError(rid, "not-found");
    }
    if (!guard(resource)) {
      throw new BadResourceError(rid, "wrong-kind", expected);
    }
    return resource;
  }

  /**
   * Removes and returns a resource. A resource of the wrong kind is left
   * in place.
   */
  take<T extends Resource>(
    rid: ResourceId,
    guard: (resource: Resource) => resource is T,
    expected?: string,
  ): T {
    const resource = this.get(rid, guard, expected);
    this.resources.delete(rid);
    return resource;
  }

  /** Removes a resource and closes it. */
  close(rid: ResourceId): void {
    const resource = this.resources.get(rid);
    if (resource === undefined) {
      throw new BadResourceError(rid, "not-found");
    }
    this.resources.delete(rid);
    resource.close();
  }

  names(): Array<[ResourceId, string]> {
    return [...this.resources].map(([rid, resource]) => [rid, resource.name]);
  }
}
