import { Body, Controller, Delete, Get, Param, ParseUUIDPipe, Post, Put, Query, Req, Res } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { ApiBody, ApiConsumes, ApiOperation, ApiParam, ApiQuery, ApiResponse, ApiTags } from "@nestjs/swagger";
import { FastifyReply, FastifyRequest } from "fastify";
import { validateForm } from "../../../common/helpers/form.validator";
import { MultipartForm, readMultipartForm } from "../../../common/helpers/multipart.reader";
import { BaseConfigInterface } from "../../../config/interfaces/base.config.interface";
import { JsonApiQuery } from "../../../core/jsonapi/serialisers/jsonapi.paginator";
import { CAT_FORM_DEFAULTS, CatFormDTO } from "../dtos/cat.form.dto";
import { CatPutDTO } from "../dtos/cat.put.dto";
import { catMeta } from "../entities/cat.meta";
import { CatService } from "../services/cat.service";

const photoFilesSchema = {
  type: "array",
  items: { type: "string", format: "binary" },
};

@ApiTags(catMeta.endpoint)
@Controller(catMeta.endpoint)
export class CatController {
  constructor(
    private readonly catService: CatService,
    private readonly configService: ConfigService<BaseConfigInterface, true>,
  ) {}

  private async readForm(request: FastifyRequest): Promise<MultipartForm> {
    return readMultipartForm(request, this.configService.get("uploads", { infer: true }));
  }

  @Get("all")
  @ApiOperation({ summary: "List cats, newest first" })
  @ApiQuery({ name: "skip", required: false, type: Number })
  @ApiQuery({ name: "limit", required: false, type: Number })
  @ApiQuery({ name: "page[offset]", required: false, type: Number })
  @ApiQuery({ name: "page[size]", required: false, type: Number })
  async findAll(@Res() reply: FastifyReply, @Query() query: JsonApiQuery) {
    const response = await this.catService.find({ query });
    reply.send(response);
  }

  @Get(":catId")
  @ApiOperation({ summary: "Read a cat with its photos and count the view" })
  @ApiParam({ name: "catId", format: "uuid" })
  @ApiResponse({ status: 404, description: "Cat not found" })
  async findOne(@Res() reply: FastifyReply, @Param("catId", ParseUUIDPipe) catId: string) {
    const response = await this.catService.findById({ catId });
    reply.send(response);
  }

  @Post("cat")
  @ApiOperation({ summary: "Create a cat, optionally with photos" })
  @ApiConsumes("multipart/form-data")
  @ApiBody({
    schema: {
      type: "object",
      properties: {
        name: { type: "string", default: CAT_FORM_DEFAULTS.name },
        age: { type: "integer", minimum: 0, default: CAT_FORM_DEFAULTS.age },
        gender: { type: "string", default: CAT_FORM_DEFAULTS.gender },
        about: { type: "string", default: CAT_FORM_DEFAULTS.about },
        sterilized: { type: "boolean", default: CAT_FORM_DEFAULTS.sterilized },
        files: photoFilesSchema,
      },
    },
  })
  async create(@Req() request: FastifyRequest, @Res() reply: FastifyReply) {
    const form = await this.readForm(request);
    const fields = await validateForm(CatFormDTO, form.fields);

    const response = await this.catService.create({ form: fields, files: form.files });
    reply.send(response);
  }

  @Post(":catId/only_photos")
  @ApiOperation({ summary: "Add photos to a cat" })
  @ApiParam({ name: "catId", format: "uuid" })
  @ApiConsumes("multipart/form-data")
  @ApiBody({
    schema: {
      type: "object",
      required: ["files"],
      properties: { files: photoFilesSchema },
    },
  })
  async addPhotos(
    @Req() request: FastifyRequest,
    @Res() reply: FastifyReply,
    @Param("catId", ParseUUIDPipe) catId: string,
  ) {
    const form = await this.readForm(request);

    const response = await this.catService.addPhotos({ catId, files: form.files });
    reply.send(response);
  }

  @Put(":catId")
  @ApiOperation({ summary: "Replace the fields of a cat" })
  @ApiParam({ name: "catId", format: "uuid" })
  async update(
    @Res() reply: FastifyReply,
    @Param("catId", ParseUUIDPipe) catId: string,
    @Body() body: CatPutDTO,
  ) {
    const response = await this.catService.update({ catId, data: body.data });
    reply.send(response);
  }

  @Delete(":catId")
  @ApiOperation({ summary: "Delete a cat and its photos" })
  @ApiParam({ name: "catId", format: "uuid" })
  async delete(@Res() reply: FastifyReply, @Param("catId", ParseUUIDPipe) catId: string) {
    const response = await this.catService.delete({ catId });
    reply.send(response);
  }
}
