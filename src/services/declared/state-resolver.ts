/**
 * State Snapshot Resolver
 *
 * Reads declared resource attributes from a Terraform state snapshot.
 * Both the `terraform show -json` layout (resources under
 * `values.root_module`, nested through `child_modules`) and the raw
 * version 4 `terraform.tfstate` layout are understood.
 */

import * as fs from 'fs/promises';
import { NotFoundError, ParseError, errorMessage } from '../../core/errors.js';
import {
  StateFileSchema,
  formatZodError,
  isShowJsonState,
  type RawState,
  type ShowJsonModule,
  type StateFile
} from '../../core/schemas.js';
import type { MapValue } from '../../models/config-value.js';
import { normalizeTree } from '../comparison/normalizer.js';
import type { DeclaredConfigResolver } from './declared-resolver.js';

export interface StateFileResolverOptions {
  /** Resource type to look for (default `aws_instance`) */
  resourceType?: string;
  /** Attribute holding the resource id (default `id`) */
  idAttribute?: string;
}

type Attributes = Record<string, unknown>;

export class StateFileResolver implements DeclaredConfigResolver {
  readonly label = 'Terraform';

  private readonly resourceType: string;
  private readonly idAttribute: string;
  private state: Promise<StateFile> | null = null;

  constructor(private readonly statePath: string, options: StateFileResolverOptions = {}) {
    this.resourceType = options.resourceType ?? 'aws_instance';
    this.idAttribute = options.idAttribute ?? 'id';
  }

  async resolve(resourceId: string): Promise<MapValue> {
    const state = await this.load();
    const attributes = isShowJsonState(state)
      ? this.findInModule(state.values.root_module, resourceId)
      : this.findInRawState(state, resourceId);

    if (!attributes) {
      throw new NotFoundError(this.resourceType, resourceId, this.statePath);
    }
    return normalizeTree(attributes);
  }

  private load(): Promise<StateFile> {
    if (this.state === null) {
      this.state = this.readState();
    }
    return this.state;
  }

  private async readState(): Promise<StateFile> {
    let content: string;
    try {
      content = await fs.readFile(this.statePath, 'utf-8');
    } catch (error) {
      throw new ParseError(`failed to read state file: ${errorMessage(error)}`, this.statePath);
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new ParseError(`failed to parse state file: ${errorMessage(error)}`, this.statePath);
    }

    const result = StateFileSchema.safeParse(data);
    if (!result.success) {
      throw new ParseError(
        `invalid state file: no root module or resources found (${formatZodError(result.error)})`,
        this.statePath
      );
    }
    return result.data;
  }

  /**
   * Depth-first: a module's own resources before its children
   */
  private findInModule(module: ShowJsonModule, resourceId: string): Attributes | null {
    for (const resource of module.resources ?? []) {
      if (this.isManaged(resource.type, resource.mode) && this.matches(resource.values, resourceId)) {
        return resource.values ?? null;
      }
    }
    for (const child of module.child_modules ?? []) {
      const found = this.findInModule(child, resourceId);
      if (found) return found;
    }
    return null;
  }

  private findInRawState(state: RawState, resourceId: string): Attributes | null {
    for (const resource of state.resources) {
      if (!this.isManaged(resource.type, resource.mode)) continue;
      for (const instance of resource.instances) {
        if (this.matches(instance.attributes, resourceId)) {
          return instance.attributes ?? null;
        }
      }
    }
    return null;
  }

  // Data sources share resource types but are not declared resources
  private isManaged(type: string, mode: string | undefined): boolean {
    return type === this.resourceType && mode !== 'data';
  }

  private matches(attributes: Attributes | null | undefined, resourceId: string): boolean {
    return attributes?.[this.idAttribute] === resourceId;
  }
}
