import { Test, TestingModule } from '@nestjs/testing';
import { ThrottlerGuard } from '@nestjs/throttler';
import { LocationController } from '../location.controller';
import { LocationService } from '../location.service';
import { CreateLocationDto } from '../dto/create-location.dto';
import { RequestContext } from '../../common/request-context';

describe('LocationController', () => {
  let controller: LocationController;

  const mockLocationService = {
    findAll: jest.fn(),
    findOne: jest.fn(),
    autocomplete: jest.fn(),
    create: jest.fn(),
    update: jest.fn(),
    remove: jest.fn(),
  };

  const mockThrottlerGuard = {
    canActivate: jest.fn(() => true),
  };

  const ctx: RequestContext = { requestId: 'req-1', path: '/api/locations' };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [LocationController],
      providers: [
        {
          provide: LocationService,
          useValue: mockLocationService,
        },
      ],
    })
      .overrideGuard(ThrottlerGuard)
      .useValue(mockThrottlerGuard)
      .compile();

    controller = module.get<LocationController>(LocationController);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should pass the query through to findAll', async () => {
    const mockResponse = { message: 'Locations fetched successfully', results: 0, data: [] };
    mockLocationService.findAll.mockResolvedValue(mockResponse);

    const result = await controller.findAll({ search: 'aspen', ordering: '-name' });

    expect(mockLocationService.findAll).toHaveBeenCalledWith({ search: 'aspen', ordering: '-name' });
    expect(result).toEqual(mockResponse);
  });

  it('should hand the q fragment to autocomplete', async () => {
    mockLocationService.autocomplete.mockResolvedValue({ results: 0, data: [] });

    await controller.autocomplete({ q: 'mia' }, ctx);

    expect(mockLocationService.autocomplete).toHaveBeenCalledWith('mia', ctx);
  });

  it('should create a location', async () => {
    const dto: CreateLocationDto = { name: 'Aspen', city: 'Aspen', state: 'Colorado' };
    const mockResponse = { message: 'Location created successfully', data: { id: 1, ...dto, country: 'USA' } };
    mockLocationService.create.mockResolvedValue(mockResponse);

    const result = await controller.create(dto, ctx);

    expect(mockLocationService.create).toHaveBeenCalledWith(dto, ctx);
    expect(result).toEqual(mockResponse);
  });

  it('should update and delete by id', async () => {
    mockLocationService.update.mockResolvedValue({ message: 'Location updated successfully' });
    mockLocationService.remove.mockResolvedValue({ message: 'Location deleted successfully' });

    await controller.update(3, { state: 'CO' }, ctx);
    await controller.remove(3, ctx);

    expect(mockLocationService.update).toHaveBeenCalledWith(3, { state: 'CO' }, ctx);
    expect(mockLocationService.remove).toHaveBeenCalledWith(3, ctx);
  });
});
