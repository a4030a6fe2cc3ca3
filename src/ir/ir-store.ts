import * as fs from 'fs';
import * as path from 'path';
import { DiagnosticLog, errorMessage } from '../diagnostics';
import { isRecord } from '../types';
import type { FunctionIR, ModuleIR, ProjectIR } from './ir-schema';
import { parseFunctionIR, parseModuleIR, parseProjectIR } from './ir-serializer';

export const FUNCTIONS_FILE = 'functions.json';
export const MODULES_FILE = 'modules.json';
export const PROJECT_FILE = 'project.json';

export interface StoredIR {
  functions: Map<string, FunctionIR>;
  modules: Map<string, ModuleIR>;
  project: ProjectIR | null;
}

function writeJson(filePath: string, data: unknown): void {
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2), 'utf-8');
}

function readJson(filePath: string, diagnostics: DiagnosticLog): unknown {
  if (!fs.existsSync(filePath)) {
    return undefined;
  }
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    diagnostics.record({
      kind: 'malformed-input',
      severity: 'medium',
      message: `Could not read ${path.basename(filePath)}: ${errorMessage(error)}`,
      file: filePath,
    });
    return undefined;
  }
}

/**
 * Parse every entry of an id-keyed document, skipping the ones that fail.
 */
function readCollection<T>(
  filePath: string,
  parse: (value: unknown, at: string) => T,
  diagnostics: DiagnosticLog
): Map<string, T> {
  const result = new Map<string, T>();
  const data = readJson(filePath, diagnostics);
  if (data === undefined) {
    return result;
  }
  if (!isRecord(data)) {
    diagnostics.record({
      kind: 'malformed-input',
      severity: 'medium',
      message: `${path.basename(filePath)} is not an object keyed by id`,
      file: filePath,
    });
    return result;
  }

  for (const [id, value] of Object.entries(data)) {
    try {
      result.set(id, parse(value, id));
    } catch (error) {
      diagnostics.record({
        kind: 'malformed-input',
        severity: 'medium',
        message: `Skipped ${id} in ${path.basename(filePath)}: ${errorMessage(error)}`,
        file: filePath,
      });
    }
  }
  return result;
}

/**
 * Write functions.json, modules.json and (when given) project.json.
 */
export function saveIR(
  directory: string,
  functions: readonly FunctionIR[],
  modules: readonly ModuleIR[],
  project: ProjectIR | null
): void {
  fs.mkdirSync(directory, { recursive: true });
  writeJson(
    path.join(directory, FUNCTIONS_FILE),
    Object.fromEntries(functions.map((fn) => [fn.id, fn]))
  );
  writeJson(
    path.join(directory, MODULES_FILE),
    Object.fromEntries(modules.map((module) => [module.id, module]))
  );
  if (project) {
    writeJson(path.join(directory, PROJECT_FILE), project);
  }
}

/**
 * Load whatever IR a directory holds. Missing files load as empty.
 */
export function loadIR(directory: string, diagnostics: DiagnosticLog = new DiagnosticLog()): StoredIR {
  const functions = readCollection(path.join(directory, FUNCTIONS_FILE), parseFunctionIR, diagnostics);
  const modules = readCollection(path.join(directory, MODULES_FILE), parseModuleIR, diagnostics);

  let project: ProjectIR | null = null;
  const projectData = readJson(path.join(directory, PROJECT_FILE), diagnostics);
  if (projectData !== undefined) {
    try {
      project = parseProjectIR(projectData);
    } catch (error) {
      diagnostics.record({
        kind: 'malformed-input',
        severity: 'medium',
        message: `Skipped project.json: ${errorMessage(error)}`,
        file: path.join(directory, PROJECT_FILE),
      });
    }
  }

  return { functions, modules, project };
}
