export * from './types.js';
export { WikipediaKnowledgeService, stripMarkup } from './wikipedia.js';
export { StaticKnowledgeService } from './static.js';
