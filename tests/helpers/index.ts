export * from './testApp';
export * from './testAuth';
export * from './testCustody';
