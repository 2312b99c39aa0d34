import {
  BadRequestException,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException
} from "@nestjs/common";
import { BlockPluginManager } from "@formblocks/plugin-system";
import {
  FormConfigurationError,
  classifyNode,
  collectFormFields,
  getSuccessUrl,
  optionListFrom
} from "@formblocks/schema-runtime";
import type { ContentNode, FormSchema } from "@formblocks/shared-types";
import {
  FORM_INVALID_ERROR,
  buildJsonSchema,
  validateSubmission,
  type FormJsonSchema
} from "@formblocks/validation-engine";
import { ContentTreeRepository } from "../content/content-tree.repository";

export interface SubmissionAccepted {
  success: true;
  redirectUrl: string;
}

@Injectable()
export class FormService {
  private readonly logger = new Logger(FormService.name);

  constructor(
    private readonly contentTree: ContentTreeRepository,
    private readonly plugins: BlockPluginManager
  ) {}

  async getSchema(formId: number): Promise<FormSchema> {
    const { schema } = await this.loadForm(formId);
    return schema;
  }

  async getJsonSchema(formId: number): Promise<FormJsonSchema> {
    return buildJsonSchema(await this.getSchema(formId));
  }

  async submit(formId: number, data: Record<string, unknown>): Promise<SubmissionAccepted> {
    const { form, schema } = await this.loadForm(formId);
    const result = validateSubmission(schema, data);

    if (!result.success) {
      this.logger.warn(`Rejected submission for form ${formId}: ${Object.keys(result.errors).join(", ")}`);
      throw new BadRequestException({
        message: form.attributes.errorMessage || FORM_INVALID_ERROR,
        errors: result.errors
      });
    }

    const payload = await this.plugins.runHook("beforeSubmit", {
      formId,
      data: result.data,
      recipients: form.attributes.recipients ?? []
    });
    const redirectUrl = await this.resolveSuccessUrl(form);
    await this.plugins.runHook("afterSubmit", payload);

    this.logger.log(`Accepted submission for form ${formId}`);
    return { success: true, redirectUrl };
  }

  // The schema is rebuilt from the current tree on every call.
  private async loadForm(formId: number): Promise<{ form: ContentNode; schema: FormSchema }> {
    const form = await this.contentTree.loadTree(formId);
    if (!form || form.type !== "form") throw new NotFoundException("Form not found");

    const options = await this.contentTree.loadOptions(this.choiceFieldIds(form));
    const schema = collectFormFields(form, { blocks: this.plugins, options: optionListFrom(options) });
    return { form, schema };
  }

  private choiceFieldIds(node: ContentNode): number[] {
    const classified = classifyNode(node, this.plugins);
    if (classified.role === "field") {
      const { fieldKind } = classified.block;
      return fieldKind === "single-choice" || fieldKind === "multi-choice" ? [node.id] : [];
    }
    if (classified.role === "opaque") return [];
    return node.children.flatMap((child) => this.choiceFieldIds(child));
  }

  private async resolveSuccessUrl(form: ContentNode): Promise<string> {
    try {
      return await getSuccessUrl(form.attributes, (pageId) => this.contentTree.resolvePageUrl(pageId));
    } catch (e) {
      if (e instanceof FormConfigurationError) {
        this.logger.error(`Form ${form.id}: ${e.message}`);
        throw new InternalServerErrorException(e.message);
      }
      throw e;
    }
  }
}
