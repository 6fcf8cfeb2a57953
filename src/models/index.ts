export * from './interest-score.model.js';
export * from './interest-graph.model.js';
export * from './content-card.model.js';
export * from './user-profile.model.js';
export * from './interest-taxonomy.model.js';
