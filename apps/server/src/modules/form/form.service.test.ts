import { BadRequestException, InternalServerErrorException, NotFoundException } from "@nestjs/common";
import { BlockPluginManager, formBlocksPlugin } from "@formblocks/plugin-system";
import type { SubmissionPayload } from "@formblocks/plugin-system";
import type { BlockAttributes, ContentNode, FieldOption } from "@formblocks/shared-types";
import { ContentTreeRepository } from "../content/content-tree.repository";
import { FormService } from "./form.service";

class InMemoryContentTreeRepository extends ContentTreeRepository {
  readonly requestedOptionIds: number[][] = [];

  constructor(
    private readonly trees: ContentNode[],
    private readonly options: Map<number, FieldOption[]>,
    private readonly pages: Map<number, string>
  ) {
    super();
  }

  async loadTree(rootId: number): Promise<ContentNode | null> {
    return this.trees.find((tree) => tree.id === rootId) ?? null;
  }

  async loadOptions(fieldIds: number[]): Promise<Map<number, FieldOption[]>> {
    this.requestedOptionIds.push(fieldIds);
    return new Map([...this.options].filter(([id]) => fieldIds.includes(id)));
  }

  async resolvePageUrl(pageId: number): Promise<string | null> {
    return this.pages.get(pageId) ?? null;
  }
}

function node(id: number, type: string, attributes: BlockAttributes = {}, children: ContentNode[] = []): ContentNode {
  return { id, type, attributes, children };
}

const contactForm = node(
  1,
  "form",
  {
    name: "Contact",
    errorMessage: "Please fix the highlighted fields.",
    redirectType: "url",
    url: "/thanks/",
    recipients: ["team@example.com"]
  },
  [
    node(2, "text-field", { label: "Name", required: true, maxValue: 50 }),
    node(3, "fieldset", { label: "Details" }, [node(4, "select-field", { label: "Topic", required: true })]),
    node(5, "submit-button", { label: "Send" })
  ]
);

const misconfiguredForm = node(6, "form", { name: "Broken", redirectType: null }, [node(7, "text-field", { label: "Email" })]);

const pageForm = node(8, "form", { name: "Newsletter", redirectType: "page", pageId: 3 }, [
  node(10, "boolean-field", { label: "Subscribe" })
]);

const looseFieldset = node(9, "fieldset", {}, [node(11, "text-field", { label: "Orphan" })]);

describe("FormService", () => {
  let repository: InMemoryContentTreeRepository;
  let plugins: BlockPluginManager;
  let service: FormService;
  let delivered: SubmissionPayload[];

  beforeEach(() => {
    repository = new InMemoryContentTreeRepository(
      [contactForm, misconfiguredForm, pageForm, looseFieldset],
      new Map([
        [
          4,
          [
            { id: 40, value: "Sales" },
            { id: 41, value: "Support" }
          ]
        ]
      ]),
      new Map([[3, "/about/"]])
    );
    delivered = [];
    plugins = new BlockPluginManager().use(formBlocksPlugin).use({
      name: "outbox",
      register(ctx) {
        ctx.addHook("afterSubmit", (payload) => {
          delivered.push(payload);
        });
      }
    });
    service = new FormService(repository, plugins);
  });

  it("collects the schema of a form with options for its choice fields", async () => {
    const schema = await service.getSchema(1);

    expect(Object.keys(schema)).toEqual(["field-2", "field-4"]);
    expect(schema["field-4"]).toMatchObject({
      kind: "single-choice",
      options: [
        { id: 40, value: "Sales" },
        { id: 41, value: "Support" }
      ]
    });
    expect(repository.requestedOptionIds).toEqual([[4]]);
  });

  it("exports the schema as JSON Schema", async () => {
    const jsonSchema = await service.getJsonSchema(1);
    expect(jsonSchema.required).toEqual(["field-2", "field-4"]);
    expect(jsonSchema.properties["field-4"]).toEqual({ title: "Topic", type: "string", enum: ["40", "41"] });
  });

  it("only serves form containers", async () => {
    await expect(service.getSchema(999)).rejects.toBeInstanceOf(NotFoundException);
    await expect(service.getSchema(9)).rejects.toBeInstanceOf(NotFoundException);
  });

  it("rejects an invalid submission with per-field errors", async () => {
    const error = await service.submit(1, { "field-4": "99" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BadRequestException);
    if (!(error instanceof BadRequestException)) throw error;
    expect(error.getResponse()).toEqual({
      message: "Please fix the highlighted fields.",
      errors: {
        "field-2": ["This field is required."],
        "field-4": ["Select a valid choice. That choice is not one of the available choices."]
      }
    });
    expect(delivered).toEqual([]);
  });

  it("accepts a valid submission and hands cleaned data to the hooks", async () => {
    const result = await service.submit(1, { "field-2": "Ada", "field-4": "41" });

    expect(result).toEqual({ success: true, redirectUrl: "/thanks/" });
    expect(delivered).toEqual([
      { formId: 1, data: { "field-2": "Ada", "field-4": "Support" }, recipients: ["team@example.com"] }
    ]);
  });

  it("passes data changed by beforeSubmit hooks on to afterSubmit", async () => {
    plugins.use({
      name: "stamp",
      register(ctx) {
        ctx.addHook("beforeSubmit", (payload) => ({ ...payload, data: { ...payload.data, source: "web" } }));
      }
    });

    await service.submit(1, { "field-2": "Ada", "field-4": "40" });

    expect(delivered[0]?.data).toEqual({ "field-2": "Ada", "field-4": "Sales", source: "web" });
  });

  it("redirects to the configured page", async () => {
    await expect(service.submit(8, {})).resolves.toEqual({ success: true, redirectUrl: "/about/" });
    expect(delivered[0]).toEqual({ formId: 8, data: { "field-10": false }, recipients: [] });
  });

  it("fails a submission on a form without a redirect", async () => {
    await expect(service.submit(6, { "field-7": "ada@example.com" })).rejects.toBeInstanceOf(
      InternalServerErrorException
    );
    expect(delivered).toEqual([]);
  });
});
