import { Injectable } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import { Model } from "mongoose";
import { rowsToTree } from "@formblocks/schema-runtime";
import type { ContentNode, FieldOption } from "@formblocks/shared-types";
import { ContentTreeRepository } from "./content-tree.repository";
import { ContentNodeEntity } from "./content-node.schema";
import { FieldOptionEntity } from "./field-option.schema";
import { PageEntity } from "./page.schema";

@Injectable()
export class MongoContentTreeRepository extends ContentTreeRepository {
  constructor(
    @InjectModel(ContentNodeEntity.name) private readonly nodeModel: Model<ContentNodeEntity>,
    @InjectModel(FieldOptionEntity.name) private readonly optionModel: Model<FieldOptionEntity>,
    @InjectModel(PageEntity.name) private readonly pageModel: Model<PageEntity>
  ) {
    super();
  }

  async loadTree(rootId: number): Promise<ContentNode | null> {
    const root = await this.nodeModel.findOne({ nodeId: rootId }).lean();
    if (!root) return null;

    const rows = await this.nodeModel.find({ placeholderId: root.placeholderId }).lean();
    return rowsToTree(
      rows.map((row) => ({
        nodeId: row.nodeId,
        parentId: row.parentId ?? null,
        position: row.position,
        type: row.blockType,
        attributes: row.attributes ?? {}
      })),
      rootId
    );
  }

  async loadOptions(fieldIds: number[]): Promise<Map<number, FieldOption[]>> {
    const grouped = new Map<number, FieldOption[]>();
    if (fieldIds.length === 0) return grouped;

    const rows = await this.optionModel
      .find({ fieldId: { $in: fieldIds } })
      .sort({ position: 1, optionId: 1 })
      .lean();
    for (const row of rows) {
      const list = grouped.get(row.fieldId) ?? [];
      list.push({ id: row.optionId, value: row.value });
      grouped.set(row.fieldId, list);
    }
    return grouped;
  }

  async resolvePageUrl(pageId: number): Promise<string | null> {
    const page = await this.pageModel.findOne({ pageId }).lean();
    return page?.path ?? null;
  }
}
