import { Module } from "@nestjs/common";
import { MongooseModule } from "@nestjs/mongoose";
import { ContentNodeEntity, ContentNodeSchema } from "./content-node.schema";
import { ContentTreeRepository } from "./content-tree.repository";
import { FieldOptionEntity, FieldOptionSchema } from "./field-option.schema";
import { MongoContentTreeRepository } from "./mongo-content-tree.repository";
import { PageEntity, PageSchema } from "./page.schema";

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: ContentNodeEntity.name, schema: ContentNodeSchema },
      { name: FieldOptionEntity.name, schema: FieldOptionSchema },
      { name: PageEntity.name, schema: PageSchema }
    ])
  ],
  providers: [{ provide: ContentTreeRepository, useClass: MongoContentTreeRepository }],
  exports: [ContentTreeRepository]
})
export class ContentModule {}
