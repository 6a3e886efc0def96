export * from "./foundations.modules";

export * from "./cat/cat.module";
export * from "./cat/entities/cat.entity";
export * from "./cat/entities/cat.model";
export * from "./cat/services/cat.service";

export * from "./photo/photo.module";
export * from "./photo/entities/photo.entity";
export * from "./photo/entities/photo.model";
export * from "./photo/services/photo.service";
