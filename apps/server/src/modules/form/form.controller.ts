import { Body, Controller, Get, HttpCode, Param, ParseIntPipe, Post } from "@nestjs/common";
import { FormService } from "./form.service";
import { SubmitFormDto } from "./dto/submit-form.dto";

@Controller("forms")
export class FormController {
  constructor(private readonly formService: FormService) {}

  @Get(":formId/schema")
  getSchema(@Param("formId", ParseIntPipe) formId: number) {
    return this.formService.getSchema(formId);
  }

  @Get(":formId/json-schema")
  getJsonSchema(@Param("formId", ParseIntPipe) formId: number) {
    return this.formService.getJsonSchema(formId);
  }

  @Post(":formId/submit")
  @HttpCode(200)
  submit(@Param("formId", ParseIntPipe) formId: number, @Body() body: SubmitFormDto) {
    return this.formService.submit(formId, body.data);
  }
}
