/**
 * Basic examples: a conversion-rate test and a revenue-per-user test
 *
 * Run with: npm run example
 */

import { proportionsZTest, ttestIndWelch, isAbTestError } from '../src';

/**
 * Example 1: conversion rate, two-sample proportion z-test
 */
export function conversionExample(): void {
  console.log('=== Conversion rate (z-test) ===\n');

  const result = proportionsZTest(998, 101, 1001, 122, { alpha: 0.05, power: 0.8 });
  console.table([result.toRow()]);

  const { mss } = result.getDetails();
  if (mss) {
    console.log(`Collected ${(mss.actualRatio * 100).toFixed(1)}% of the ${mss.requiredN} users needed per arm`);
  }
}

/**
 * Example 2: average order value, Welch t-test
 */
export function orderValueExample(): void {
  console.log('\n=== Order value (Welch t-test) ===\n');

  const control = [10.1, 9.8, 11.2, 10.5, 9.9, 10.8, 10.3, 11.0, 9.7, 10.4, 9.8, 10.1];
  const treatment = [11.0, 10.5, 11.8, 10.9, 11.2, 10.5, 10.7, 10.1, 10.3, 10.8];

  const result = ttestIndWelch(control, treatment);
  console.table([result.toRow()]);
  console.log(result.export('csv'));
}

/**
 * Example 3: what a partial row looks like
 */
export function partialRowExample(): void {
  console.log('\n=== Zero control conversions ===\n');

  const result = proportionsZTest(500, 0, 500, 7, { debug: true });
  console.table([result.toRow()]);

  try {
    ttestIndWelch([4, 4, 4], [3, 5, 6]);
  } catch (error) {
    if (!isAbTestError(error)) throw error;
    console.log(error.toString());
  }
}

conversionExample();
orderValueExample();
partialRowExample();
