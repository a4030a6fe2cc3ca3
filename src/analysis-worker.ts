/**
 * Worker thread for parallel file analysis.
 * This file is executed by piscina worker threads.
 */

import { CppSourceParser } from './cpp-parser';
import { FileAnalysis, analyzeFile } from './file-analysis';

export interface AnalysisTask {
  filePath: string;
  projectRoot: string;
}

export interface AnalysisResult {
  success: boolean;
  data?: FileAnalysis;
  error?: string;
}

let parser: CppSourceParser | null = null;

/**
 * Analyze a single file in a worker thread.
 * This function is called by piscina for each file.
 */
export default function analyzeFileWorker(task: AnalysisTask): AnalysisResult {
  try {
    parser ??= new CppSourceParser();
    return {
      success: true,
      data: analyzeFile(task.filePath, parser, task.projectRoot),
    };
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
