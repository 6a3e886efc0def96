import { Injectable, OnModuleInit } from "@nestjs/common";
import { JsonApiCursorInterface } from "../../../core/jsonapi/interfaces/jsonapi.cursor.interface";
import { Neo4jService } from "../../../core/neo4j/services/neo4j.service";
import { Cat } from "../entities/cat.entity";
import { CatModel } from "../entities/cat.model";

export type CatFields = {
  name: string;
  age: number;
  gender: string;
  about: string;
  sterilized: boolean;
};

@Injectable()
export class CatRepository implements OnModuleInit {
  constructor(private readonly neo4j: Neo4jService) {}

  async onModuleInit() {
    await this.neo4j.write(`CREATE CONSTRAINT cat_id IF NOT EXISTS FOR (cat:Cat) REQUIRE cat.id IS UNIQUE`);
  }

  async findMany(params: { cursor?: JsonApiCursorInterface }): Promise<Cat[]> {
    const query = this.neo4j.initQuery({ serialiser: CatModel, cursor: params.cursor });

    query.query = `
      MATCH (cat:Cat)
      WITH cat
      ORDER BY cat.registeredAt DESC, cat.id ASC
      {CURSOR}

      RETURN cat
    `;

    return this.neo4j.readMany(query);
  }

  async findById(params: { catId: string }): Promise<Cat | null> {
    const query = this.neo4j.initQuery({ serialiser: CatModel });

    query.queryParams = {
      catId: params.catId,
    };

    query.query = `
      MATCH (cat:Cat {id: $catId})
      OPTIONAL MATCH (cat)-[:HAS_PHOTO]->(photo:Photo)
      WITH cat, photo
      ORDER BY photo.createdAt ASC
      WITH cat, collect(photo) AS cat_photo
      RETURN cat, cat_photo
    `;

    return this.neo4j.readOne(query);
  }

  /**
   * Adds one view and returns the cat with its photos, or null when the cat does not exist.
   */
  async incrementViews(params: { catId: string }): Promise<Cat | null> {
    const query = this.neo4j.initQuery({ serialiser: CatModel, retry: false });

    query.queryParams = {
      catId: params.catId,
    };

    query.query = `
      MATCH (cat:Cat {id: $catId})
      SET cat.views = coalesce(cat.views, 0) + 1
      WITH cat
      OPTIONAL MATCH (cat)-[:HAS_PHOTO]->(photo:Photo)
      WITH cat, photo
      ORDER BY photo.createdAt ASC
      WITH cat, collect(photo) AS cat_photo
      RETURN cat, cat_photo
    `;

    return this.neo4j.writeOne(query);
  }

  async create(params: { id: string } & CatFields): Promise<Cat | null> {
    const query = this.neo4j.initQuery({ serialiser: CatModel, retry: false });

    query.queryParams = {
      id: params.id,
      name: params.name,
      age: params.age,
      gender: params.gender,
      about: params.about,
      sterilized: params.sterilized,
    };

    query.query = `
      CREATE (cat:Cat {
        id: $id,
        name: $name,
        age: $age,
        gender: $gender,
        about: $about,
        sterilized: $sterilized,
        views: 0,
        registeredAt: datetime(),
        createdAt: datetime(),
        updatedAt: datetime()
      })
      RETURN cat
    `;

    return this.neo4j.writeOne(query);
  }

  async setFolder(params: { catId: string; googleFolderId: string }): Promise<void> {
    await this.neo4j.write(
      `
      MATCH (cat:Cat {id: $catId})
      SET cat.googleFolderId = $googleFolderId, cat.updatedAt = datetime()
      `,
      {
        catId: params.catId,
        googleFolderId: params.googleFolderId,
      },
    );
  }

  async update(params: { catId: string } & CatFields): Promise<Cat | null> {
    const query = this.neo4j.initQuery({ serialiser: CatModel });

    query.queryParams = {
      catId: params.catId,
      name: params.name,
      age: params.age,
      gender: params.gender,
      about: params.about,
      sterilized: params.sterilized,
    };

    query.query = `
      MATCH (cat:Cat {id: $catId})
      SET cat.name = $name,
        cat.age = $age,
        cat.gender = $gender,
        cat.about = $about,
        cat.sterilized = $sterilized,
        cat.updatedAt = datetime()
      RETURN cat
    `;

    return this.neo4j.writeOne(query);
  }

  async delete(params: { catId: string }): Promise<void> {
    await this.neo4j.write(
      `
      MATCH (cat:Cat {id: $catId})
      OPTIONAL MATCH (cat)-[:HAS_PHOTO]->(photo:Photo)
      DETACH DELETE photo, cat
      `,
      {
        catId: params.catId,
      },
    );
  }
}
