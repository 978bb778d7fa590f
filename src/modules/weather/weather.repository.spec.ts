import { TtlCache } from '../utils/ttl-cache';
import { ServiceUnavailableError } from '../utils/domain.errors';
import { WeatherRepository } from './weather.repository';
import { failure, success, WeatherProvider } from './weather-provider.interface';
import { Location, WeatherData, WeatherForecast } from './weather.dto';

const london: Location = {
  id: '51.5074,-0.1278',
  name: 'London',
  country: 'GB',
  latitude: 51.5074,
  longitude: -0.1278,
};

const londonForecast: WeatherForecast = {
  location: london,
  forecasts: [
    {
      date: '2024-06-11',
      temperatureMin: 14,
      temperatureMax: 25,
      description: 'clear sky',
      humidity: 60,
      windSpeed: 3,
      pressure: 1015,
    },
  ],
};

const londonWeather: WeatherData = {
  location: london,
  timestamp: '2024-06-10T12:00:00.000Z',
  temperature: 21,
  description: 'few clouds',
  humidity: 55,
  windSpeed: 4,
  pressure: 1013,
};

describe('WeatherRepository', () => {
  let now: number;
  let provider: jest.Mocked<WeatherProvider>;
  let weatherCache: TtlCache<WeatherData>;
  let forecastCache: TtlCache<WeatherForecast>;
  let locationCache: TtlCache<Location>;
  let repository: WeatherRepository;

  beforeEach(() => {
    now = 0;
    const clock = () => now;
    provider = {
      getCurrentWeather: jest.fn(),
      getForecast: jest.fn(),
      getLocationDetails: jest.fn(),
      getProviderName: jest.fn().mockReturnValue('Fake'),
    };
    weatherCache = new TtlCache({ namespace: 'weather', ttlMs: 15 * 60_000, maxSize: 10 }, clock);
    forecastCache = new TtlCache({ namespace: 'forecast', ttlMs: 60 * 60_000, maxSize: 10 }, clock);
    locationCache = new TtlCache({ namespace: 'location', ttlMs: 24 * 60 * 60_000, maxSize: 10 }, clock);
    repository = new WeatherRepository(provider, weatherCache, forecastCache, locationCache);
  });

  describe('getForecast', () => {
    it('serves a repeat request from the cache', async () => {
      provider.getForecast.mockResolvedValue(success(londonForecast));

      expect(await repository.getForecast(london, 5)).toBe(londonForecast);
      expect(await repository.getForecast(london, 5)).toBe(londonForecast);

      expect(provider.getForecast).toHaveBeenCalledTimes(1);
      expect(provider.getForecast).toHaveBeenCalledWith(51.5074, -0.1278, 5);
      expect(forecastCache.get('forecast_51.5074,-0.1278_5d')).toBe(londonForecast);
    });

    it('keys forecasts by day count', async () => {
      provider.getForecast.mockResolvedValue(success(londonForecast));

      await repository.getForecast(london, 5);
      await repository.getForecast(london, 3);

      expect(provider.getForecast).toHaveBeenCalledTimes(2);
    });

    it('refetches after the forecast TTL', async () => {
      provider.getForecast.mockResolvedValue(success(londonForecast));

      await repository.getForecast(london, 5);
      now += 60 * 60_000;
      await repository.getForecast(london, 5);

      expect(provider.getForecast).toHaveBeenCalledTimes(2);
    });

    it('returns null without caching for an unknown location', async () => {
      provider.getForecast.mockResolvedValue(failure('LOCATION_NOT_FOUND', 'Location not found'));

      expect(await repository.getForecast(london, 5)).toBeNull();
      expect(forecastCache.size()).toBe(0);
    });

    it('returns null without caching for an empty forecast', async () => {
      provider.getForecast.mockResolvedValue(success({ location: london, forecasts: [] }));

      expect(await repository.getForecast(london, 5)).toBeNull();
      expect(forecastCache.size()).toBe(0);
    });

    it.each([
      ['NETWORK_ERROR' as const],
      ['RATE_LIMIT_EXCEEDED' as const],
      ['INVALID_API_KEY' as const],
      ['UNKNOWN_ERROR' as const],
    ])('raises service unavailable for %s and caches nothing', async (kind) => {
      provider.getForecast.mockResolvedValue(failure(kind, 'upstream said no'));

      await expect(repository.getForecast(london, 5)).rejects.toThrow(
        new ServiceUnavailableError('Weather service unavailable: upstream said no'),
      );
      expect(forecastCache.size()).toBe(0);
    });

    it('wraps an unexpected provider exception', async () => {
      const cause = new Error('bug');
      provider.getForecast.mockRejectedValue(cause);

      const error = await repository.getForecast(london, 5).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ServiceUnavailableError);
      if (error instanceof ServiceUnavailableError) {
        expect(error.message).toBe('Weather service temporarily unavailable');
        expect(error.cause).toBe(cause);
      }
    });
  });

  describe('getCurrentWeather', () => {
    it('caches current conditions under the weather key', async () => {
      provider.getCurrentWeather.mockResolvedValue(success(londonWeather));

      expect(await repository.getCurrentWeather(london)).toBe(londonWeather);
      expect(weatherCache.get('weather_51.5074,-0.1278')).toBe(londonWeather);

      now += 15 * 60_000;
      await repository.getCurrentWeather(london);
      expect(provider.getCurrentWeather).toHaveBeenCalledTimes(2);
    });
  });

  describe('getLocationById', () => {
    it('parses the id and caches the location', async () => {
      provider.getLocationDetails.mockResolvedValue(success(london));

      expect(await repository.getLocationById('51.5074,-0.1278')).toBe(london);
      expect(await repository.getLocationById('51.5074,-0.1278')).toBe(london);

      expect(provider.getLocationDetails).toHaveBeenCalledTimes(1);
      expect(provider.getLocationDetails).toHaveBeenCalledWith(51.5074, -0.1278);
      expect(locationCache.get('location_51.5074,-0.1278')).toBe(london);
    });

    it.each(['invalid', '51.5074', '95,0'])(
      'returns null for the malformed id %p without calling upstream',
      async (locationId) => {
        expect(await repository.getLocationById(locationId)).toBeNull();
        expect(provider.getLocationDetails).not.toHaveBeenCalled();
      },
    );

    it('returns null for an unknown location', async () => {
      provider.getLocationDetails.mockResolvedValue(failure('LOCATION_NOT_FOUND', 'Location not found'));

      expect(await repository.getLocationById('0,0')).toBeNull();
    });
  });

  describe('getLocationsByIds', () => {
    it('skips ids that are malformed, unknown or failing', async () => {
      provider.getLocationDetails.mockImplementation(async (latitude) => {
        if (latitude === 51.5074) return success(london);
        if (latitude === 10) return failure('LOCATION_NOT_FOUND', 'Location not found');
        return failure('NETWORK_ERROR', 'timeout');
      });

      const locations = await repository.getLocationsByIds([
        '51.5074,-0.1278',
        'garbage',
        '10,10',
        '20,20',
      ]);

      expect(locations).toEqual([london]);
    });
  });
});
