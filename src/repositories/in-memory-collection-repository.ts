import { randomUUID } from 'node:crypto';

import type {
  Collection,
  CollectionRepository,
  CreateCollectionInput,
  CreateGraphInput,
  Graph
} from './collection-repository.js';

function cloneCollection(collection: Collection): Collection {
  return {
    ...collection,
    createdAt: new Date(collection.createdAt)
  };
}

function cloneGraph(graph: Graph): Graph {
  return {
    ...graph,
    createdAt: new Date(graph.createdAt)
  };
}

export class InMemoryCollectionRepository implements CollectionRepository {
  private readonly collectionsById = new Map<string, Collection>();

  private readonly graphsById = new Map<string, Graph>();

  private readonly collectionIdsByUserId = new Map<string, Set<string>>();

  public createCollection(input: CreateCollectionInput): Promise<Collection> {
    const collection: Collection = {
      id: randomUUID(),
      ownerId: input.ownerId,
      name: input.name,
      description: input.description,
      createdAt: new Date()
    };

    this.collectionsById.set(collection.id, collection);
    return Promise.resolve(cloneCollection(collection));
  }

  public createGraph(input: CreateGraphInput): Promise<Graph> {
    if (!this.collectionsById.has(input.collectionId)) {
      return Promise.reject(new Error(`Collection ${input.collectionId} does not exist.`));
    }

    const graph: Graph = {
      id: randomUUID(),
      collectionId: input.collectionId,
      name: input.name,
      description: input.description,
      createdAt: new Date()
    };

    this.graphsById.set(graph.id, graph);
    return Promise.resolve(cloneGraph(graph));
  }

  public addUserToCollection(userId: string, collectionId: string): Promise<void> {
    const memberships = this.collectionIdsByUserId.get(userId) ?? new Set<string>();
    memberships.add(collectionId);
    this.collectionIdsByUserId.set(userId, memberships);
    return Promise.resolve();
  }

  public listCollectionsForUser(userId: string): Promise<Collection[]> {
    const collectionIds = this.collectionIdsByUserId.get(userId) ?? new Set<string>();
    const collections = Array.from(collectionIds)
      .map((collectionId) => this.collectionsById.get(collectionId))
      .filter((collection): collection is Collection => collection !== undefined)
      .sort((left, right) => left.createdAt.getTime() - right.createdAt.getTime())
      .map(cloneCollection);

    return Promise.resolve(collections);
  }

  public listGraphsForCollection(collectionId: string): Graph[] {
    return Array.from(this.graphsById.values())
      .filter((graph) => graph.collectionId === collectionId)
      .map(cloneGraph);
  }
}
