import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Patch, Post, Query, UseGuards } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { ThrottlerGuard } from '@nestjs/throttler';
import { PropertyService } from './property.service';
import { CreatePropertyDto } from './dto/create-property.dto';
import { UpdatePropertyDto } from './dto/update-property.dto';
import { PropertyQueryDto } from './dto/property-query.dto';
import { ReqContext, RequestContext } from '../common/request-context';
import {
  CreateApiResponses,
  DeleteApiResponses,
  GetManyApiResponses,
  GetOneApiResponses,
  UpdateApiResponses,
} from '../common/utils/api-responses.util';

@ApiTags('Properties')
@Controller('properties')
@UseGuards(ThrottlerGuard)
export class PropertyController {
  constructor(private readonly propertyService: PropertyService) { }

  @Get()
  @ApiOperation({ summary: 'List properties, filtered by location, type, minimum bedrooms and availability' })
  @GetManyApiResponses('Properties')
  async findAll(
    @Query() query: PropertyQueryDto,
    @ReqContext() ctx: RequestContext,
  ) {
    return this.propertyService.findAll(query, ctx);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a property with its location and images' })
  @GetOneApiResponses('Property')
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return this.propertyService.findOne(id);
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create a property' })
  @CreateApiResponses('Property')
  async create(
    @Body() createPropertyDto: CreatePropertyDto,
    @ReqContext() ctx: RequestContext,
  ) {
    return this.propertyService.create(createPropertyDto, ctx);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a property' })
  @UpdateApiResponses('Property')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() updatePropertyDto: UpdatePropertyDto,
    @ReqContext() ctx: RequestContext,
  ) {
    return this.propertyService.update(id, updatePropertyDto, ctx);
  }

  @Delete(':id')
  @ApiOperation({ summary: 'Delete a property and its images' })
  @DeleteApiResponses('Property')
  async remove(
    @Param('id', ParseIntPipe) id: number,
    @ReqContext() ctx: RequestContext,
  ) {
    return this.propertyService.remove(id, ctx);
  }
}
