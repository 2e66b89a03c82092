/**
 * HCL Definition Resolver
 *
 * Finds a resource's declared attributes in Terraform `.tf` files. A
 * resource block is matched by the value at `matchAttribute` (by default
 * its `Name` tag), since definition files do not know cloud-assigned ids.
 */

import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { NotFoundError, ParseError, errorMessage } from '../../core/errors.js';
import { type ConfigValue, type MapValue, listValue, mapValue } from '../../models/config-value.js';
import { resolvePath } from '../comparison/path-resolver.js';
import type { DeclaredConfigResolver } from './declared-resolver.js';
import { parseHcl, type HclBlock, type HclBody } from './hcl-parser.js';

export interface HclResolverOptions {
  /** Resource type to look for (default `aws_instance`) */
  resourceType?: string;
  /** Attribute path whose value is the resource id (default `tags.Name`) */
  matchAttribute?: string;
}

interface ParsedFile {
  file: string;
  body: HclBody;
}

// Meta-arguments and meta-blocks that configure Terraform, not the resource
const META_ATTRIBUTES = new Set(['count', 'for_each', 'depends_on', 'provider']);
const META_BLOCKS = new Set(['lifecycle', 'provisioner', 'connection', 'dynamic']);

export class HclResolver implements DeclaredConfigResolver {
  readonly label = 'Terraform';

  private readonly resourceType: string;
  private readonly matchAttribute: string;
  private files: Promise<ParsedFile[]> | null = null;

  constructor(private readonly configPath: string, options: HclResolverOptions = {}) {
    this.resourceType = options.resourceType ?? 'aws_instance';
    this.matchAttribute = options.matchAttribute ?? 'tags.Name';
  }

  async resolve(resourceId: string): Promise<MapValue> {
    const files = await this.load();

    for (const { body } of files) {
      for (const block of body.blocks) {
        if (!this.isResourceBlock(block)) continue;
        const tree = blockToTree(block.body);
        const match = resolvePath(tree, this.matchAttribute);
        if (match.found && match.value.kind === 'string' && match.value.value === resourceId) {
          return tree;
        }
      }
    }

    throw new NotFoundError(this.resourceType, resourceId, this.configPath);
  }

  private isResourceBlock(block: HclBlock): boolean {
    return block.type === 'resource' && block.labels.length >= 2 && block.labels[0] === this.resourceType;
  }

  private load(): Promise<ParsedFile[]> {
    if (this.files === null) {
      this.files = this.parseAll();
    }
    return this.files;
  }

  private async parseAll(): Promise<ParsedFile[]> {
    const paths = await this.findConfigFiles();
    const parsed: ParsedFile[] = [];
    for (const file of paths) {
      const source = await fs.readFile(file, 'utf-8');
      parsed.push({ file, body: parseHcl(source, file) });
    }
    return parsed;
  }

  private async findConfigFiles(): Promise<string[]> {
    let stat: Stats;
    try {
      stat = await fs.stat(this.configPath);
    } catch (error) {
      throw new ParseError(`failed to stat config path: ${errorMessage(error)}`, this.configPath);
    }

    if (!stat.isDirectory()) {
      if (!this.configPath.endsWith('.tf')) {
        throw new ParseError('config file must have .tf extension', this.configPath);
      }
      return [this.configPath];
    }

    const files = await walkTfFiles(this.configPath);
    if (files.length === 0) {
      throw new ParseError(`no .tf files found in ${this.configPath}`, this.configPath);
    }
    return files;
  }
}

/**
 * Recursively lists `.tf` files, sorted so matching is deterministic
 */
async function walkTfFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));

  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walkTfFiles(fullPath)));
    } else if (entry.isFile() && entry.name.endsWith('.tf')) {
      files.push(fullPath);
    }
  }
  return files;
}

/**
 * Converts a block body to the tree shape a state snapshot uses:
 * literal attributes as values, nested blocks as a list of maps under
 * the block type. Unresolved expressions are left out.
 */
export function blockToTree(body: HclBody): MapValue {
  const entries = new Map<string, ConfigValue>();

  for (const [name, attribute] of body.attributes) {
    if (META_ATTRIBUTES.has(name) || !attribute.expression.resolved) continue;
    entries.set(name, attribute.expression.value);
  }

  const nested = new Map<string, MapValue[]>();
  for (const block of body.blocks) {
    if (META_BLOCKS.has(block.type)) continue;
    const group = nested.get(block.type) ?? [];
    group.push(blockToTree(block.body));
    nested.set(block.type, group);
  }
  for (const [type, blocks] of nested) {
    entries.set(type, listValue(blocks));
  }

  return mapValue(entries);
}
