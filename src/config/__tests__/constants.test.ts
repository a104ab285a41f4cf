import {
  CROPPED_SUFFIX,
  DEFAULTS,
  RECOGNITION_ENDPOINTS,
  STREAM_INTERVAL_MS,
  getApiUrl,
  getCaptureDir,
  getDetectionThreshold,
  getPort,
  getRequestTimeoutMs,
  isApiUrlConfigured,
} from '../constants';
import { ConfigurationError } from '../../utils/errors';

describe('Constants', () => {
  it('should stream one frame per second', () => {
    expect(STREAM_INTERVAL_MS).toBe(1000);
  });

  it('should name crops with the cropped suffix', () => {
    expect(CROPPED_SUFFIX).toBe('_cropped.jpg');
  });

  it('should point at the recognition endpoints', () => {
    expect(RECOGNITION_ENDPOINTS.START_STREAM).toBe('/start_stream');
    expect(RECOGNITION_ENDPOINTS.MAIN).toBe('/main');
  });
});

describe('Environment configuration', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  describe('getApiUrl', () => {
    it('should throw ConfigurationError when API_URL is not set', () => {
      delete process.env.API_URL;

      expect(() => getApiUrl()).toThrow(ConfigurationError);
      expect(isApiUrlConfigured()).toBe(false);
    });

    it('should treat a blank API_URL as missing', () => {
      process.env.API_URL = '   ';

      expect(() => getApiUrl()).toThrow('API_URL is not configured');
    });

    it('should strip trailing slashes', () => {
      process.env.API_URL = 'http://backend.test:5000//';

      expect(getApiUrl()).toBe('http://backend.test:5000');
      expect(isApiUrlConfigured()).toBe(true);
    });
  });

  it('should fall back to defaults', () => {
    delete process.env.PORT;
    delete process.env.CAPTURE_DIR;
    delete process.env.FACE_DETECTION_THRESHOLD;
    delete process.env.REQUEST_TIMEOUT_MS;

    expect(getPort()).toBe(DEFAULTS.PORT);
    expect(getCaptureDir()).toBe('/tmp/face-capture');
    expect(getDetectionThreshold()).toBe(0.6);
    expect(getRequestTimeoutMs()).toBe(10000);
  });

  it('should read overrides from the environment', () => {
    process.env.PORT = '8080';
    process.env.CAPTURE_DIR = '/data/captures';
    process.env.FACE_DETECTION_THRESHOLD = '0.75';

    expect(getPort()).toBe(8080);
    expect(getCaptureDir()).toBe('/data/captures');
    expect(getDetectionThreshold()).toBe(0.75);
  });
});
