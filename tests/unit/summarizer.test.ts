import { describe, it, expect } from 'vitest';
import { summarizeDataset } from '../../src/lib/summarizer/index.js';
import { analyzeColumn, type AnalysisContext } from '../../src/lib/analyzer/index.js';
import { getDefaultRegistry } from '../../src/lib/registry/index.js';
import { DEFAULT_ANALYSIS_CONFIG } from '../../src/types/config.js';
import { accountNumbers, holderNames, nulls } from '../helpers/columns.js';

const context: AnalysisContext = {
  registry: getDefaultRegistry(),
  config: DEFAULT_ANALYSIS_CONFIG,
  rowCount: 100,
};

const accountNumber = analyzeColumn('account_number', accountNumbers(), context);
const customerName = analyzeColumn('customer_name', holderNames(), context);
const mystery = analyzeColumn('mystery', nulls(), context);

describe('Dataset Summarizer', () => {
  it('should count identified columns, domains and eligible identifiers', () => {
    expect(summarizeDataset([accountNumber, customerName, mystery])).toEqual({
      totalColumns: 3,
      identifiedColumns: 2,
      unidentifiedColumns: 1,
      identificationRate: 66.7,
      averageConfidence: 100,
      domainDistribution: { Account: 1, Customer: 1 },
      identifierCount: 1,
    });
  });

  it('should average only non-zero confidences', () => {
    const summary = summarizeDataset([
      { ...accountNumber, confidence: 80 },
      { ...customerName, confidence: 55.5 },
      mystery,
    ]);
    expect(summary.averageConfidence).toBe(67.8);
  });

  it('should not count ineligible identifier matches', () => {
    const ineligible = {
      ...accountNumber,
      eligibility: { ...accountNumber.eligibility, isEligible: false },
    };
    expect(summarizeDataset([ineligible]).identifierCount).toBe(0);
  });

  it('should return zeros for no columns', () => {
    expect(summarizeDataset([])).toEqual({
      totalColumns: 0,
      identifiedColumns: 0,
      unidentifiedColumns: 0,
      identificationRate: 0,
      averageConfidence: 0,
      domainDistribution: {},
      identifierCount: 0,
    });
  });
});
