import { randomUUID } from 'node:crypto';

import type { Pool } from 'pg';

import type {
  Collection,
  CollectionRepository,
  CreateCollectionInput,
  CreateGraphInput,
  Graph
} from './collection-repository.js';
import { getSingleRow } from './postgres-helpers.js';

interface CollectionRow {
  id: string;
  owner_id: string;
  name: string;
  description: string | null;
  created_at: Date;
}

interface GraphRow {
  id: string;
  collection_id: string;
  name: string;
  description: string | null;
  created_at: Date;
}

function mapCollection(row: CollectionRow): Collection {
  return {
    id: row.id,
    ownerId: row.owner_id,
    name: row.name,
    description: row.description,
    createdAt: row.created_at
  };
}

function mapGraph(row: GraphRow): Graph {
  return {
    id: row.id,
    collectionId: row.collection_id,
    name: row.name,
    description: row.description,
    createdAt: row.created_at
  };
}

export class PostgresCollectionRepository implements CollectionRepository {
  public constructor(private readonly pool: Pool) {}

  public async createCollection(input: CreateCollectionInput): Promise<Collection> {
    const result = await this.pool.query<CollectionRow>(
      `
      INSERT INTO collections (id, owner_id, name, description, created_at)
      VALUES ($1, $2, $3, $4, NOW())
      RETURNING *
      `,
      [randomUUID(), input.ownerId, input.name, input.description]
    );

    const row = getSingleRow(result.rows);
    if (row === null) {
      throw new Error('Failed to create collection row.');
    }

    return mapCollection(row);
  }

  public async createGraph(input: CreateGraphInput): Promise<Graph> {
    const result = await this.pool.query<GraphRow>(
      `
      INSERT INTO graphs (id, collection_id, name, description, created_at)
      VALUES ($1, $2, $3, $4, NOW())
      RETURNING *
      `,
      [randomUUID(), input.collectionId, input.name, input.description]
    );

    const row = getSingleRow(result.rows);
    if (row === null) {
      throw new Error('Failed to create graph row.');
    }

    return mapGraph(row);
  }

  public async addUserToCollection(userId: string, collectionId: string): Promise<void> {
    await this.pool.query(
      `
      INSERT INTO collection_members (collection_id, user_id, created_at)
      VALUES ($1, $2, NOW())
      ON CONFLICT (collection_id, user_id) DO NOTHING
      `,
      [collectionId, userId]
    );
  }

  public async listCollectionsForUser(userId: string): Promise<Collection[]> {
    const result = await this.pool.query<CollectionRow>(
      `
      SELECT c.*
      FROM collections c
      INNER JOIN collection_members m
        ON m.collection_id = c.id
      WHERE m.user_id = $1
      ORDER BY c.created_at ASC, c.id ASC
      `,
      [userId]
    );

    return result.rows.map(mapCollection);
  }
}
