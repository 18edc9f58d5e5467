import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseFilePipe,
  ParseIntPipe,
  Patch,
  Post,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ApiConsumes, ApiOperation, ApiTags } from '@nestjs/swagger';
import { ThrottlerGuard } from '@nestjs/throttler';
import { ImageService } from './image.service';
import { CreateImageDto } from './dto/create-image.dto';
import { UpdateImageDto } from './dto/update-image.dto';
import { multerOptions } from './config/multer.config';
import { FileSignatureValidator } from './validation/file-signature.validator';
import { IMAGE_CONSTANTS } from './constants/image.constants';
import { ReqContext, RequestContext } from '../common/request-context';
import {
  CreateApiResponses,
  DeleteApiResponses,
  GetManyApiResponses,
  UpdateApiResponses,
} from '../common/utils/api-responses.util';

@ApiTags('Images')
@Controller()
@UseGuards(ThrottlerGuard)
export class ImageController {
  constructor(private readonly imageService: ImageService) { }

  @Get('properties/:propertyId/images')
  @ApiOperation({ summary: 'List the images of a property (primary first)' })
  @GetManyApiResponses('Images')
  async findForProperty(@Param('propertyId', ParseIntPipe) propertyId: number) {
    return this.imageService.findForProperty(propertyId);
  }

  @Post('properties/:propertyId/images')
  @HttpCode(HttpStatus.CREATED)
  @ApiConsumes('multipart/form-data')
  @ApiOperation({ summary: 'Upload an image for a property' })
  @CreateApiResponses('Image')
  @UseInterceptors(FileInterceptor('image', multerOptions))
  async upload(
    @Param('propertyId', ParseIntPipe) propertyId: number,
    @UploadedFile(
      new ParseFilePipe({
        validators: [
          new FileSignatureValidator({
            allowedMimeTypes: IMAGE_CONSTANTS.ALLOWED_MIME_TYPES,
            maxFileSize: IMAGE_CONSTANTS.MAX_FILE_SIZE,
          }),
        ],
      }),
    )
    image: Express.Multer.File,
    @Body() createImageDto: CreateImageDto,
    @ReqContext() ctx: RequestContext,
  ) {
    return this.imageService.upload(propertyId, image, createImageDto, ctx);
  }

  @Patch('images/:id')
  @ApiOperation({ summary: 'Update the caption or primary flag of an image' })
  @UpdateApiResponses('Image')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() updateImageDto: UpdateImageDto,
    @ReqContext() ctx: RequestContext,
  ) {
    return this.imageService.update(id, updateImageDto, ctx);
  }

  @Delete('images/:id')
  @ApiOperation({ summary: 'Delete an image and its file' })
  @DeleteApiResponses('Image')
  async remove(
    @Param('id', ParseIntPipe) id: number,
    @ReqContext() ctx: RequestContext,
  ) {
    return this.imageService.remove(id, ctx);
  }
}
