/**
 * JSON (de)serialization of the IR.
 *
 * Serialization is plain JSON. Deserialization validates the shape of every
 * field and throws IRFormatError, naming the offending path, when a document
 * does not describe the expected entity.
 */

import { Attributes, isAttributes, isRecord, isStringArray } from '../types';
import type {
  ControlBlock,
  FunctionIR,
  IfBlock,
  MainFlow,
  ModuleIR,
  ParameterIR,
  ProjectIR,
} from './ir-schema';

export class IRFormatError extends Error {
  constructor(
    readonly path: string,
    message: string
  ) {
    super(`${path}: ${message}`);
    this.name = 'IRFormatError';
  }
}

function expectRecord(value: unknown, at: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new IRFormatError(at, 'expected an object');
  }
  return value;
}

function expectString(value: unknown, at: string): string {
  if (typeof value !== 'string') {
    throw new IRFormatError(at, 'expected a string');
  }
  return value;
}

function expectNullableString(value: unknown, at: string): string | null {
  return value === null || value === undefined ? null : expectString(value, at);
}

function expectNumber(value: unknown, at: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new IRFormatError(at, 'expected a number');
  }
  return value;
}

function expectStringArray(value: unknown, at: string): string[] {
  if (!isStringArray(value)) {
    throw new IRFormatError(at, 'expected an array of strings');
  }
  return [...value];
}

function expectAttributes(value: unknown, at: string): Attributes {
  if (value === undefined) {
    return {};
  }
  if (!isAttributes(value)) {
    throw new IRFormatError(at, 'expected an object of JSON values');
  }
  return value;
}

function expectArray(value: unknown, at: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new IRFormatError(at, 'expected an array');
  }
  return value;
}

export function parseControlBlock(value: unknown, at = 'block'): ControlBlock {
  const data = expectRecord(value, at);
  const id = expectString(data.id, `${at}.id`);
  const metadata = expectAttributes(data.metadata, `${at}.metadata`);

  switch (data.type) {
    case 'sequence':
      return { type: 'sequence', id, label: expectString(data.label, `${at}.label`), metadata };

    case 'if': {
      const block: IfBlock = {
        type: 'if',
        id,
        condition: expectString(data.condition, `${at}.condition`),
        then_children: parseControlBlocks(data.then_children, `${at}.then_children`),
        metadata,
      };
      if (data.else_children !== undefined) {
        block.else_children = parseControlBlocks(data.else_children, `${at}.else_children`);
      }
      return block;
    }

    case 'loop':
      return {
        type: 'loop',
        id,
        label: expectString(data.label, `${at}.label`),
        body_children: parseControlBlocks(data.body_children, `${at}.body_children`),
        metadata,
      };

    default:
      throw new IRFormatError(`${at}.type`, `unknown block type ${JSON.stringify(data.type)}`);
  }
}

export function parseControlBlocks(value: unknown, at: string): ControlBlock[] {
  return expectArray(value, at).map((item, index) => parseControlBlock(item, `${at}[${index}]`));
}

function parseParameter(value: unknown, at: string): ParameterIR {
  const data = expectRecord(value, at);
  return {
    type: expectString(data.type, `${at}.type`),
    name: expectString(data.name, `${at}.name`),
  };
}

export function parseFunctionIR(value: unknown, at = 'function'): FunctionIR {
  const data = expectRecord(value, at);
  return {
    id: expectString(data.id, `${at}.id`),
    name: expectString(data.name, `${at}.name`),
    signature: expectString(data.signature, `${at}.signature`),
    file: expectString(data.file, `${at}.file`),
    line: expectNumber(data.line, `${at}.line`),
    namespace: expectNullableString(data.namespace, `${at}.namespace`),
    class_name: expectNullableString(data.class_name, `${at}.class_name`),
    inputs: expectArray(data.inputs, `${at}.inputs`).map((item, index) =>
      parseParameter(item, `${at}.inputs[${index}]`)
    ),
    outputs: expectStringArray(data.outputs, `${at}.outputs`),
    control_blocks: parseControlBlocks(data.control_blocks, `${at}.control_blocks`),
    calls: expectStringArray(data.calls, `${at}.calls`),
    complexity: expectNumber(data.complexity, `${at}.complexity`),
    metadata: expectAttributes(data.metadata, `${at}.metadata`),
  };
}

export function parseModuleIR(value: unknown, at = 'module'): ModuleIR {
  const data = expectRecord(value, at);
  return {
    id: expectString(data.id, `${at}.id`),
    name: expectString(data.name, `${at}.name`),
    path: expectString(data.path, `${at}.path`),
    entry_points: expectStringArray(data.entry_points, `${at}.entry_points`),
    public_api: expectStringArray(data.public_api, `${at}.public_api`),
    private_api: expectStringArray(data.private_api, `${at}.private_api`),
    functions: expectStringArray(data.functions, `${at}.functions`),
    dependencies: expectStringArray(data.dependencies, `${at}.dependencies`),
    metadata: expectAttributes(data.metadata, `${at}.metadata`),
  };
}

function parseMainFlow(value: unknown, at: string): MainFlow {
  const data = expectRecord(value, at);
  return {
    module: expectString(data.module, `${at}.module`),
    entry_points: expectStringArray(data.entry_points, `${at}.entry_points`),
  };
}

export function parseProjectIR(value: unknown, at = 'project'): ProjectIR {
  const data = expectRecord(value, at);
  return {
    id: expectString(data.id, `${at}.id`),
    name: expectString(data.name, `${at}.name`),
    root_path: expectString(data.root_path, `${at}.root_path`),
    modules: expectStringArray(data.modules, `${at}.modules`),
    main_flows: expectArray(data.main_flows, `${at}.main_flows`).map((item, index) =>
      parseMainFlow(item, `${at}.main_flows[${index}]`)
    ),
    startup_sequence: expectStringArray(data.startup_sequence, `${at}.startup_sequence`),
    metadata: expectAttributes(data.metadata, `${at}.metadata`),
  };
}

function parseJson(json: string, at: string): unknown {
  try {
    return JSON.parse(json);
  } catch (error) {
    throw new IRFormatError(at, error instanceof Error ? error.message : String(error));
  }
}

export function serializeFunction(ir: FunctionIR): string {
  return JSON.stringify(ir, null, 2);
}

export function deserializeFunction(json: string): FunctionIR {
  return parseFunctionIR(parseJson(json, 'function'));
}

export function serializeModule(ir: ModuleIR): string {
  return JSON.stringify(ir, null, 2);
}

export function deserializeModule(json: string): ModuleIR {
  return parseModuleIR(parseJson(json, 'module'));
}

export function serializeProject(ir: ProjectIR): string {
  return JSON.stringify(ir, null, 2);
}

export function deserializeProject(json: string): ProjectIR {
  return parseProjectIR(parseJson(json, 'project'));
}
