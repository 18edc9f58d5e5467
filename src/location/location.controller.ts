import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Patch, Post, Query, UseGuards } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { ThrottlerGuard } from '@nestjs/throttler';
import { LocationService } from './location.service';
import { CreateLocationDto } from './dto/create-location.dto';
import { UpdateLocationDto } from './dto/update-location.dto';
import { LocationQueryDto } from './dto/location-query.dto';
import { AutocompleteQueryDto } from './dto/autocomplete-query.dto';
import { ReqContext, RequestContext } from '../common/request-context';
import {
  CreateApiResponses,
  DeleteApiResponses,
  GetManyApiResponses,
  GetOneApiResponses,
  UpdateApiResponses,
} from '../common/utils/api-responses.util';

@ApiTags('Locations')
@Controller('locations')
@UseGuards(ThrottlerGuard)
export class LocationController {
  constructor(private readonly locationService: LocationService) { }

  @Get()
  @ApiOperation({ summary: 'List all locations' })
  @GetManyApiResponses('Locations')
  async findAll(@Query() query: LocationQueryDto) {
    return this.locationService.findAll(query);
  }

  // Declared before ':id' so "autocomplete" is not parsed as an id
  @Get('autocomplete')
  @ApiOperation({ summary: 'Search locations by a name, city or state fragment (min 2 chars)' })
  @GetManyApiResponses('Locations')
  async autocomplete(
    @Query() query: AutocompleteQueryDto,
    @ReqContext() ctx: RequestContext,
  ) {
    return this.locationService.autocomplete(query.q, ctx);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a single location' })
  @GetOneApiResponses('Location')
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return this.locationService.findOne(id);
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create a location' })
  @CreateApiResponses('Location')
  async create(
    @Body() createLocationDto: CreateLocationDto,
    @ReqContext() ctx: RequestContext,
  ) {
    return this.locationService.create(createLocationDto, ctx);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a location' })
  @UpdateApiResponses('Location')
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() updateLocationDto: UpdateLocationDto,
    @ReqContext() ctx: RequestContext,
  ) {
    return this.locationService.update(id, updateLocationDto, ctx);
  }

  @Delete(':id')
  @ApiOperation({ summary: 'Delete a location (its properties are kept, unassigned)' })
  @DeleteApiResponses('Location')
  async remove(
    @Param('id', ParseIntPipe) id: number,
    @ReqContext() ctx: RequestContext,
  ) {
    return this.locationService.remove(id, ctx);
  }
}
