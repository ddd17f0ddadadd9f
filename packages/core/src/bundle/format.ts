/**
 * On-disk bundle layout.
 *
 *   <root>/mismatches/<timestamp>__<operationId>__<key8>/
 *     case.json | chain.json   descriptor (the planned case, or chain prefix)
 *     target_a.json            requests as sent and responses from target A
 *     target_b.json            same for target B
 *     diff.json                reproduction key and comparison per step
 *     metadata.json            run provenance
 */

import type { ChainStep, ComparisonResult, Mismatch, ReplayClassification, RequestCase, StepResult } from '../types/model.js';
import type { RunOutcome } from '../chain/chain-runner.js';

export const MISMATCHES_DIR = 'mismatches';
export const CASE_FILE = 'case.json';
export const CHAIN_FILE = 'chain.json';
export const TARGET_A_FILE = 'target_a.json';
export const TARGET_B_FILE = 'target_b.json';
export const DIFF_FILE = 'diff.json';
export const METADATA_FILE = 'metadata.json';

export type BundleType = 'case' | 'chain';

export interface TargetInfo {
  name: string;
  baseUrl: string;
}

export interface StepRecord {
  stepIndex: number;
  operationId: string;
  request: RequestCase;
  response: StepResult;
}

export interface TargetRecord {
  target: TargetInfo;
  steps: StepRecord[];
}

export interface ChainDescriptor {
  chainId: string;
  sequenceKey: string;
  steps: ChainStep[];
}

export interface DiffRecord {
  type: BundleType;
  reproductionKey: string;
  match: boolean;
  outcome: RunOutcome;
  /** Step that stopped the run */
  haltedAt?: number;
  /** Steps planned for the chain, including those never executed */
  totalSteps: number;
  /** Mismatches of the halting step */
  mismatches: Mismatch[];
  steps: Array<{ stepIndex: number; comparison: ComparisonResult }>;
  replay?: { classification: ReplayClassification; sourceBundle: string };
}

export interface BundleMetadata {
  toolVersion: string;
  timestamp: string;
  seed?: number;
  specPath?: string;
  rulesPath?: string;
  targetA: TargetInfo;
  targetB: TargetInfo;
}
