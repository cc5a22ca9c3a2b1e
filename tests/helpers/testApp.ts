import { Application } from 'express';
import { createApp } from '../../src/app';
import { createTestCustody, TestCustody } from './testCustody';

export interface TestApp extends TestCustody {
  app: Application;
}

/**
 * A fresh app over an empty custody and simulated rail
 */
export const getTestApp = (): TestApp => {
  const testCustody = createTestCustody();
  return { ...testCustody, app: createApp(testCustody.custody) };
};
