import { Node, Record as Neo4jRecord } from "neo4j-driver";
import { Cat } from "../foundations/cat/entities/cat.entity";
import { Photo } from "../foundations/photo/entities/photo.entity";

export const TEST_IDS = {
  catId: "550e8400-e29b-41d4-a716-446655440000",
  otherCatId: "550e8400-e29b-41d4-a716-446655440001",
  photoId: "660e8400-e29b-41d4-a716-446655440000",
  otherPhotoId: "660e8400-e29b-41d4-a716-446655440001",
};

export const TEST_DATE = "2024-05-01T10:00:00.000Z";

export const TEST_API_CONFIG = {
  url: "http://localhost:8000/",
  host: "127.0.0.1",
  port: 8000,
  env: "test",
};

export const createPhoto = (overrides: Partial<Photo> = {}): Photo => ({
  id: TEST_IDS.photoId,
  type: "photo",
  createdAt: new Date(TEST_DATE),
  updatedAt: new Date(TEST_DATE),
  url: "https://drive.google.com/uc?id=file-1",
  googleFileId: "file-1",
  filename: "tom.jpg",
  ...overrides,
});

export const createCat = (overrides: Partial<Cat> = {}): Cat => ({
  id: TEST_IDS.catId,
  type: "cat",
  createdAt: new Date(TEST_DATE),
  updatedAt: new Date(TEST_DATE),
  name: "Tom",
  age: 4,
  gender: "male",
  about: "Ginger and loud",
  sterilized: true,
  views: 2,
  googleFolderId: "folder-1",
  registeredAt: new Date(TEST_DATE),
  ...overrides,
});

let identity = 0;

export const createNode = (label: string, properties: Record<string, unknown>): Node<number> => {
  identity += 1;
  return new Node(identity, [label], properties, `4:test:${identity}`);
};

export const createCatNode = (properties: Record<string, unknown> = {}): Node<number> =>
  createNode("Cat", {
    id: TEST_IDS.catId,
    name: "Tom",
    age: 4,
    gender: "male",
    about: "Ginger and loud",
    sterilized: true,
    views: 2,
    googleFolderId: "folder-1",
    registeredAt: TEST_DATE,
    createdAt: TEST_DATE,
    updatedAt: TEST_DATE,
    ...properties,
  });

export const createPhotoNode = (properties: Record<string, unknown> = {}): Node<number> =>
  createNode("Photo", {
    id: TEST_IDS.photoId,
    url: "https://drive.google.com/uc?id=file-1",
    googleFileId: "file-1",
    filename: "tom.jpg",
    createdAt: TEST_DATE,
    updatedAt: TEST_DATE,
    ...properties,
  });

export const createRecord = (fields: Record<string, unknown>): Neo4jRecord =>
  new Neo4jRecord(Object.keys(fields), Object.values(fields));
