import { ClientFactory } from '../ClientFactory.js';
import { ConfigService } from '../ConfigService.js';
import { InMemoryTaskStore } from '../implementations/InMemoryTaskStore.js';
import { SupabaseTaskStore } from '../implementations/SupabaseTaskStore.js';
import { TaskStore } from '../interfaces/TaskStore.js';

export class TaskStoreFactory {
  static create(config: ConfigService, clients: ClientFactory): TaskStore {
    if (config.taskStore === 'memory') {
      console.warn('Using in-memory task store; tasks are lost on restart');
      return new InMemoryTaskStore();
    }
    return new SupabaseTaskStore(clients.createSupabaseClient());
  }
}
