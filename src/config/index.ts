export * from './envs.js';
