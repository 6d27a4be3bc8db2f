import type { KnowledgeSource } from '../../content/knowledge.js';
import type { ContentRepository } from '../../content/repository.js';
import type { ObjectStorage } from '../../storage/object-storage.js';
import type { AIProvider } from '../ai-provider.js';

export interface HandlerDeps {
  ai: AIProvider;
  knowledge: KnowledgeSource;
  content: ContentRepository;
  storage: ObjectStorage;
  now?: () => Date;
}
