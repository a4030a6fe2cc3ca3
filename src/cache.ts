import * as fs from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';
import type { CallSite } from './call-sites';
import type { Diagnostic, DiagnosticKind } from './diagnostics';
import type { FileAnalysis, FunctionAnalysis } from './file-analysis';
import { parseFunctionIR } from './ir/ir-serializer';
import { isRecord } from './types';

/**
 * Cache entry for an analyzed file
 */
interface CacheEntry {
  /** Hash of the file content when it was analyzed */
  contentHash: string;
  /** Modification time of the file when it was cached */
  mtime: number;
  /** The cached analysis */
  data: FileAnalysis;
}

const CACHE_VERSION = '1.1.0';
const CACHE_FILE = 'analysis-cache.json';

const DIAGNOSTIC_KINDS: readonly DiagnosticKind[] = [
  'not-found',
  'malformed-input',
  'unresolved-reference',
  'integrity-warning',
  'unit-failure',
];

function parseCallSite(value: unknown): CallSite | null {
  if (
    !isRecord(value) ||
    typeof value.name !== 'string' ||
    typeof value.line !== 'number' ||
    (value.kind !== 'direct' && value.kind !== 'method')
  ) {
    return null;
  }
  const qualifiedName = typeof value.qualifiedName === 'string' ? value.qualifiedName : null;
  return { name: value.name, qualifiedName, kind: value.kind, line: value.line };
}

function parseDiagnostic(value: unknown): Diagnostic | null {
  if (!isRecord(value) || typeof value.message !== 'string') {
    return null;
  }
  const kind = DIAGNOSTIC_KINDS.find((candidate) => candidate === value.kind);
  const severity = value.severity;
  if (!kind || (severity !== 'high' && severity !== 'medium' && severity !== 'low')) {
    return null;
  }
  const diagnostic: Diagnostic = { kind, severity, message: value.message };
  if (typeof value.file === 'string') diagnostic.file = value.file;
  if (typeof value.line === 'number') diagnostic.line = value.line;
  return diagnostic;
}

function parseFunctionAnalysis(value: unknown): FunctionAnalysis | null {
  if (
    !isRecord(value) ||
    typeof value.qualifiedName !== 'string' ||
    !Array.isArray(value.callSites)
  ) {
    return null;
  }
  const callSites: CallSite[] = [];
  for (const item of value.callSites) {
    const site = parseCallSite(item);
    if (!site) return null;
    callSites.push(site);
  }
  return {
    ir: parseFunctionIR(value.ir),
    qualifiedName: value.qualifiedName,
    isVirtual: value.isVirtual === true,
    isStatic: value.isStatic === true,
    callSites,
  };
}

/**
 * Rebuild a cached FileAnalysis, or null when the stored shape is off.
 */
export function parseFileAnalysis(value: unknown): FileAnalysis | null {
  if (
    !isRecord(value) ||
    typeof value.file !== 'string' ||
    !Array.isArray(value.functions) ||
    !Array.isArray(value.diagnostics)
  ) {
    return null;
  }

  try {
    const functions: FunctionAnalysis[] = [];
    for (const item of value.functions) {
      const fn = parseFunctionAnalysis(item);
      if (!fn) return null;
      functions.push(fn);
    }
    const diagnostics: Diagnostic[] = [];
    for (const item of value.diagnostics) {
      const diagnostic = parseDiagnostic(item);
      if (!diagnostic) return null;
      diagnostics.push(diagnostic);
    }
    return { file: value.file, functions, diagnostics };
  } catch {
    // parseFunctionIR rejected the stored IR; treat as a cache miss
    return null;
  }
}

function parseCacheEntry(value: unknown): CacheEntry | null {
  if (!isRecord(value) || typeof value.contentHash !== 'string' || typeof value.mtime !== 'number') {
    return null;
  }
  const data = parseFileAnalysis(value.data);
  return data ? { contentHash: value.contentHash, mtime: value.mtime, data } : null;
}

/**
 * Analysis cache storing per-file results to speed up repeated runs
 */
export class AnalysisCache {
  private cache: Map<string, CacheEntry> = new Map();
  private cacheFile: string;
  private dirty = false;

  constructor(private readonly cacheDir: string) {
    this.cacheFile = path.join(this.cacheDir, CACHE_FILE);
    this.load();
  }

  /**
   * Get cached analysis for a file if it's still valid
   */
  get(filePath: string): FileAnalysis | null {
    const entry = this.cache.get(filePath);
    if (!entry) {
      return null;
    }

    try {
      const stats = fs.statSync(filePath);
      const mtime = stats.mtimeMs;

      // Fast path: check if mtime matches
      if (entry.mtime === mtime) {
        return entry.data;
      }

      // Slow path: mtime changed, check content hash
      const content = fs.readFileSync(filePath, 'utf-8');
      const contentHash = this.hashContent(content);

      if (entry.contentHash === contentHash) {
        // Content hasn't actually changed, update mtime and return cached data
        entry.mtime = mtime;
        this.dirty = true;
        return entry.data;
      }

      // Content changed, invalidate cache
      this.cache.delete(filePath);
      this.dirty = true;
      return null;
    } catch {
      // File doesn't exist or can't be read
      this.cache.delete(filePath);
      this.dirty = true;
      return null;
    }
  }

  /**
   * Store analysis for a file. Returns false when the file cannot be read.
   */
  set(filePath: string, data: FileAnalysis): boolean {
    try {
      const content = fs.readFileSync(filePath, 'utf-8');
      const stats = fs.statSync(filePath);

      this.cache.set(filePath, {
        contentHash: this.hashContent(content),
        mtime: stats.mtimeMs,
        data,
      });
      this.dirty = true;
      return true;
    } catch {
      // Can't cache if we can't read the file
      return false;
    }
  }

  /**
   * Save cache to disk
   */
  save(): void {
    if (!this.dirty) {
      return;
    }

    fs.mkdirSync(this.cacheDir, { recursive: true });
    const cacheFile = {
      version: CACHE_VERSION,
      entries: Object.fromEntries(this.cache),
    };
    fs.writeFileSync(this.cacheFile, JSON.stringify(cacheFile), 'utf-8');
    this.dirty = false;
  }

  /**
   * Load cache from disk
   */
  private load(): void {
    if (!fs.existsSync(this.cacheFile)) {
      return;
    }

    let cacheFile: unknown;
    try {
      cacheFile = JSON.parse(fs.readFileSync(this.cacheFile, 'utf-8'));
    } catch {
      // Corrupt cache file: start over
      return;
    }

    // Invalidate cache if version changed
    if (!isRecord(cacheFile) || cacheFile.version !== CACHE_VERSION || !isRecord(cacheFile.entries)) {
      return;
    }

    for (const [filePath, value] of Object.entries(cacheFile.entries)) {
      const entry = parseCacheEntry(value);
      if (entry) {
        this.cache.set(filePath, entry);
      }
    }
  }

  /**
   * Clear all cached data
   */
  clear(): void {
    this.cache.clear();
    this.dirty = false;

    if (fs.existsSync(this.cacheFile)) {
      fs.unlinkSync(this.cacheFile);
    }
  }

  /**
   * Get the number of cached entries
   */
  get size(): number {
    return this.cache.size;
  }

  /**
   * Hash file content for comparison
   */
  private hashContent(content: string): string {
    return crypto.createHash('md5').update(content).digest('hex');
  }
}
