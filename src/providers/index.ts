export * from './types';
export * from './registry';
export * from './gemini/geminiProvider';
export * from './mock/mockProvider';
