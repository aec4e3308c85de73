export interface Collection {
  id: string;
  ownerId: string;
  name: string;
  description: string | null;
  createdAt: Date;
}

export interface Graph {
  id: string;
  collectionId: string;
  name: string;
  description: string | null;
  createdAt: Date;
}

export interface CreateCollectionInput {
  ownerId: string;
  name: string;
  description: string | null;
}

export interface CreateGraphInput {
  collectionId: string;
  name: string;
  description: string | null;
}

export interface CollectionRepository {
  createCollection(input: CreateCollectionInput): Promise<Collection>;
  createGraph(input: CreateGraphInput): Promise<Graph>;
  addUserToCollection(userId: string, collectionId: string): Promise<void>;
  listCollectionsForUser(userId: string): Promise<Collection[]>;
}
