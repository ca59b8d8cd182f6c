export * from './console.reporter';
export * from './report.writer';
