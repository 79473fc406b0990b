import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';
import { IngestionService } from './ingestion.service.js';
import { ingestDocumentSchema } from './dto/ingest-document.dto.js';

@Controller('api/v1/knowledge/documents')
export class KnowledgeController {
  constructor(private readonly ingestionService: IngestionService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async ingest(@Body() body: unknown) {
    const payload = ingestDocumentSchema.parse(body);
    const base = {
      sourceType: payload.sourceType,
      sourceKey: payload.sourceKey,
      displayName: payload.displayName ?? payload.sourceKey,
    };

    const outcome =
      payload.contentBase64 !== undefined && payload.mimeType !== undefined
        ? await this.ingestionService.ingestContent({
            ...base,
            content: Buffer.from(payload.contentBase64, 'base64'),
            mimeType: payload.mimeType,
          })
        : await this.ingestionService.ingest({
            ...base,
            text: payload.text ?? '',
          });

    return { data: outcome };
  }

  @Get()
  async list() {
    const documents = await this.ingestionService.listDocuments();
    return { data: documents };
  }

  @Get(':id')
  async get(@Param('id') id: string) {
    const document = await this.ingestionService.getDocument(id);
    return { data: document };
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id') id: string): Promise<void> {
    await this.ingestionService.remove(id);
  }
}
