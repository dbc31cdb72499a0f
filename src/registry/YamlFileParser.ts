/**
 * YAML File Parser
 *
 * Structured-file parser for server configuration files. Every YAML
 * document in the file becomes one top-level node.
 */

import { promises as fsp } from 'fs';
import { isMap, isScalar, isSeq, parseAllDocuments } from 'yaml';
import type {
  ParsedDocument,
  StructuredFileParser,
  StructuredNode,
  StructuredNodeKind,
  StructuredNodeOf
} from '../types/index.js';
import { toError } from '../utils/errors.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNodeOf<K extends StructuredNodeKind>(kind: K) {
  return (node: StructuredNode): node is StructuredNodeOf<K> => node.kind === kind;
}

export class YamlDocument implements ParsedDocument {
  constructor(
    private readonly nodes: StructuredNode[],
    private readonly parseErrors: string[]
  ) {}

  errors(): string[] {
    return [...this.parseErrors];
  }

  findData<K extends StructuredNodeKind>(kind: K): StructuredNodeOf<K>[] {
    return this.nodes.filter(isNodeOf(kind));
  }
}

/**
 * Parse YAML source text into a document of structured nodes
 */
export function parseYamlSource(source: string): YamlDocument {
  const nodes: StructuredNode[] = [];
  const errors: string[] = [];

  for (const doc of parseAllDocuments(source)) {
    for (const error of doc.errors) {
      errors.push(error.message);
    }

    const contents = doc.contents;
    if (contents === null) continue;

    let value: unknown;
    try {
      value = doc.toJS();
    } catch (err) {
      errors.push(toError(err).message);
      continue;
    }

    if (isMap(contents) && isRecord(value)) {
      nodes.push({ kind: 'map', value });
    } else if (isSeq(contents) && Array.isArray(value)) {
      nodes.push({ kind: 'sequence', value });
    } else if (isScalar(contents)) {
      nodes.push({ kind: 'scalar', value });
    }
  }

  return new YamlDocument(nodes, errors);
}

export class YamlFileParser implements StructuredFileParser {
  async parse(filePath: string): Promise<ParsedDocument> {
    const source = await fsp.readFile(filePath, 'utf8');
    return parseYamlSource(source);
  }
}
