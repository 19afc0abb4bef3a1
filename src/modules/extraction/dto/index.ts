export * from './submit-extraction.dto';
