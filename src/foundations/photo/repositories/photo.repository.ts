import { Injectable, OnModuleInit } from "@nestjs/common";
import { Neo4jService } from "../../../core/neo4j/services/neo4j.service";
import { Photo } from "../entities/photo.entity";
import { PhotoModel } from "../entities/photo.model";

@Injectable()
export class PhotoRepository implements OnModuleInit {
  constructor(private readonly neo4j: Neo4jService) {}

  async onModuleInit() {
    await this.neo4j.write(`CREATE CONSTRAINT photo_id IF NOT EXISTS FOR (photo:Photo) REQUIRE photo.id IS UNIQUE`);
  }

  async createForCat(params: {
    catId: string;
    id: string;
    url: string;
    googleFileId: string;
    filename: string;
  }): Promise<Photo | null> {
    const query = this.neo4j.initQuery({ serialiser: PhotoModel, retry: false });

    query.queryParams = {
      catId: params.catId,
      id: params.id,
      url: params.url,
      googleFileId: params.googleFileId,
      filename: params.filename,
    };

    query.query = `
      MATCH (cat:Cat {id: $catId})
      CREATE (photo:Photo {
        id: $id,
        url: $url,
        googleFileId: $googleFileId,
        filename: $filename,
        createdAt: datetime(),
        updatedAt: datetime()
      })
      CREATE (cat)-[:HAS_PHOTO]->(photo)
      RETURN photo
    `;

    return this.neo4j.writeOne(query);
  }

  async findByCat(params: { catId: string }): Promise<Photo[]> {
    const query = this.neo4j.initQuery({ serialiser: PhotoModel, fetchAll: true });

    query.queryParams = {
      catId: params.catId,
    };

    query.query = `
      MATCH (cat:Cat {id: $catId})-[:HAS_PHOTO]->(photo:Photo)
      RETURN photo
      ORDER BY photo.createdAt ASC
    `;

    return this.neo4j.readMany(query);
  }
}
