import { extractionLogger } from '../../logger';
import type { FieldResult, ValidationCheck, ValidationOutcome } from './types';

export const DEFAULT_VALIDATION_TOLERANCE = 100;

export interface BalanceRule {
  name: string;
  description: string;
  // The declared figure the operands must add up to.
  total: string;
  operands: readonly string[];
}

export const BALANCE_RULES: readonly BalanceRule[] = [
  {
    name: 'assets-equal-fund-capital-plus-liabilities',
    description: 'Total assets equal total fund capital plus total liabilities',
    total: 'TOTALASSETS',
    operands: ['TOTALFUNDCAPITAL', 'TOTALLIABILITIES'],
  },
  {
    name: 'assets-equal-fund-capital-and-liabilities',
    description: 'Total assets equal total fund capital and liabilities',
    total: 'TOTALASSETS',
    operands: ['TOTALFUNDCAPITALANDLIABILITIES'],
  },
  {
    name: 'fund-capital-roll-forward',
    description: 'Fund capital carried forward plus net payments and net result equals total fund capital',
    total: 'TOTALFUNDCAPITAL',
    operands: ['FUNDCAPITALCARRIEDFORWARD', 'NETPAYMENTSTOTHENATIONALPENSIONSYSTEM', 'NETRESULTFORTHEPERIOD'],
  },
  {
    name: 'fund-capital-and-liabilities-total',
    description: 'Total fund capital plus total liabilities equals total fund capital and liabilities',
    total: 'TOTALFUNDCAPITALANDLIABILITIES',
    operands: ['TOTALFUNDCAPITAL', 'TOTALLIABILITIES'],
  },
  {
    name: 'asset-components',
    description: 'Asset lines sum to total assets',
    total: 'TOTALASSETS',
    operands: [
      'EQUITIESANDPARTICIPATIONSLISTED',
      'EQUITIESANDPARTICIPATIONSUNLISTED',
      'BONDSANDOTHERFIXEDINCOMESECURITIES',
      'DERIVATIVEINSTRUMENTS',
      'CASHANDBANKBALANCES',
      'OTHERASSETS',
      'PREPAIDEXPENSESANDACCRUEDINCOME',
    ],
  },
  {
    name: 'liability-components',
    description: 'Liability lines sum to total liabilities',
    total: 'TOTALLIABILITIES',
    operands: ['DERIVATIVEINSTRUMENTSLIABILITIES', 'OTHERLIABILITIES', 'DEFERREDINCOMEANDACCRUEDEXPENSES'],
  },
];

function roundDifference(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function evaluateRule(
  rule: BalanceRule,
  values: ReadonlyMap<string, number>,
  tolerance: number
): ValidationCheck {
  const expected = values.get(rule.total);
  const operands = rule.operands.map(identifier => values.get(identifier));

  if (expected === undefined || operands.some(value => value === undefined)) {
    return {
      name: rule.name,
      description: rule.description,
      status: 'not-applicable',
      expected: null,
      actual: null,
      difference: null,
    };
  }

  const actual = operands.reduce<number>((sum, value) => sum + (value ?? 0), 0);
  const difference = roundDifference(actual - expected);
  return {
    name: rule.name,
    description: rule.description,
    status: Math.abs(difference) <= tolerance ? 'pass' : 'fail',
    expected,
    actual,
    difference,
  };
}

/**
 * Checks the balance-sheet arithmetic of a finished record. Never changes a
 * value: failures are reported and logged as data-quality warnings.
 */
export function validateRecord(
  fields: readonly FieldResult[],
  tolerance: number = DEFAULT_VALIDATION_TOLERANCE,
  rules: readonly BalanceRule[] = BALANCE_RULES
): ValidationOutcome {
  const values = new Map<string, number>();
  for (const field of fields) {
    if (field.value !== null) values.set(field.identifier, field.value);
  }

  const checks = rules.map(rule => evaluateRule(rule, values, tolerance));

  for (const check of checks.filter(c => c.status === 'fail')) {
    extractionLogger.warn({
      check: check.name,
      expected: check.expected,
      actual: check.actual,
      difference: check.difference,
      tolerance,
    }, 'Validation check failed');
  }

  return {
    checks,
    passed: checks.filter(c => c.status === 'pass').length,
    failed: checks.filter(c => c.status === 'fail').length,
    notApplicable: checks.filter(c => c.status === 'not-applicable').length,
  };
}
