import 'reflect-metadata';

// Silences the winston logger, which reads NODE_ENV when first imported
process.env.NODE_ENV = 'test';
