import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { AnalysisCache, parseFileAnalysis } from '../src/cache';
import { analyzeTree } from '../src/file-analysis';
import { block, call, exprStmt, fn, unit } from './helpers/syntax';

describe('AnalysisCache', () => {
  let projectDir: string;
  let cacheDir: string;
  let sourceFile: string;

  beforeEach(() => {
    projectDir = fs.mkdtempSync(path.join(os.tmpdir(), 'flowgraph-cache-'));
    cacheDir = path.join(projectDir, '.flowgraph-cache');
    sourceFile = path.join(projectDir, 'main.cc');
    fs.writeFileSync(sourceFile, 'int main() { init(); }\n');
  });

  afterEach(() => {
    fs.rmSync(projectDir, { recursive: true, force: true });
  });

  const analysis = () =>
    analyzeTree(unit(fn('main', block(exprStmt(call('init'))))), sourceFile, projectDir);

  it('should return stored analysis while the file is unchanged', () => {
    const cache = new AnalysisCache(cacheDir);
    const data = analysis();

    expect(cache.set(sourceFile, data)).toBe(true);
    expect(cache.get(sourceFile)).toBe(data);
    expect(cache.size).toBe(1);
  });

  it('should persist entries across instances', () => {
    const data = analysis();
    const first = new AnalysisCache(cacheDir);
    first.set(sourceFile, data);
    first.save();

    const second = new AnalysisCache(cacheDir);

    expect(second.size).toBe(1);
    expect(second.get(sourceFile)).toEqual(data);
  });

  it('should invalidate an entry when the content changes', () => {
    const cache = new AnalysisCache(cacheDir);
    cache.set(sourceFile, analysis());

    fs.writeFileSync(sourceFile, 'int main() { return 1; }\n');
    fs.utimesSync(sourceFile, new Date(1000), new Date(1000));

    expect(cache.get(sourceFile)).toBeNull();
    expect(cache.size).toBe(0);
  });

  it('should keep an entry when only the modification time changes', () => {
    const cache = new AnalysisCache(cacheDir);
    const data = analysis();
    cache.set(sourceFile, data);

    fs.utimesSync(sourceFile, new Date(1000), new Date(1000));

    expect(cache.get(sourceFile)).toBe(data);
  });

  it('should drop entries for deleted files', () => {
    const cache = new AnalysisCache(cacheDir);
    cache.set(sourceFile, analysis());
    fs.unlinkSync(sourceFile);

    expect(cache.get(sourceFile)).toBeNull();
    expect(cache.set(sourceFile, analysis())).toBe(false);
  });

  it('should clear memory and disk', () => {
    const cache = new AnalysisCache(cacheDir);
    cache.set(sourceFile, analysis());
    cache.save();

    cache.clear();

    expect(cache.size).toBe(0);
    expect(fs.existsSync(path.join(cacheDir, 'analysis-cache.json'))).toBe(false);
  });

  it('should ignore a corrupt or outdated cache file', () => {
    fs.mkdirSync(cacheDir, { recursive: true });
    fs.writeFileSync(path.join(cacheDir, 'analysis-cache.json'), '{');
    expect(new AnalysisCache(cacheDir).size).toBe(0);

    fs.writeFileSync(
      path.join(cacheDir, 'analysis-cache.json'),
      JSON.stringify({ version: '0.1.0', entries: {} })
    );
    expect(new AnalysisCache(cacheDir).size).toBe(0);
  });
});

describe('parseFileAnalysis', () => {
  it('should rebuild a stored analysis', () => {
    const data = analyzeTree(unit(fn('run', block(exprStmt(call('step', 1))))), '/proj/run.cc', '/proj');

    expect(parseFileAnalysis(JSON.parse(JSON.stringify(data)))).toEqual(data);
  });

  it('should reject shapes it does not recognize', () => {
    expect(parseFileAnalysis({ file: 3, functions: [], diagnostics: [] })).toBeNull();
    expect(
      parseFileAnalysis({
        file: 'a.cc',
        functions: [{ qualifiedName: 'f', callSites: [{ name: 'g', line: 1, kind: 'virtual' }], ir: {} }],
        diagnostics: [],
      })
    ).toBeNull();
    expect(
      parseFileAnalysis({
        file: 'a.cc',
        functions: [],
        diagnostics: [{ kind: 'fatal', severity: 'high', message: 'x' }],
      })
    ).toBeNull();
    expect(
      parseFileAnalysis({
        file: 'a.cc',
        functions: [{ qualifiedName: 'f', callSites: [], ir: { id: 1 } }],
        diagnostics: [],
      })
    ).toBeNull();
  });
});
