import { getAWSClientConfig } from '../../../utils/aws-client-config';

describe('getAWSClientConfig', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('should use static credentials from the environment', () => {
    process.env.AWS_ACCESS_KEY_ID = 'test-key';
    process.env.AWS_SECRET_ACCESS_KEY = 'test-secret';
    delete process.env.AWS_SESSION_TOKEN;

    expect(getAWSClientConfig('eu-west-1')).toEqual({
      region: 'eu-west-1',
      credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
    });
  });

  it('should carry a session token', () => {
    process.env.AWS_SESSION_TOKEN = 'test-token';

    expect(getAWSClientConfig('eu-west-1').credentials?.sessionToken).toBe('test-token');
  });

  it('should fall back to AWS_REGION and the default provider chain', () => {
    delete process.env.AWS_ACCESS_KEY_ID;
    delete process.env.AWS_SECRET_ACCESS_KEY;
    delete process.env.AWS_PROFILE;
    process.env.AWS_REGION = 'us-east-2';

    expect(getAWSClientConfig()).toEqual({ region: 'us-east-2' });
  });
});
