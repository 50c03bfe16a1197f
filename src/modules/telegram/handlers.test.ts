import { parseBannerArgs } from './handlers';

jest.mock('../../utils/logger', () => ({
  createModuleLogger: () => ({
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  }),
}));

describe('parseBannerArgs', () => {
  it('should return nothing for a bare command', () => {
    expect(parseBannerArgs('/banner')).toEqual({});
  });

  it('should read a ratio and a platform in any order', () => {
    expect(parseBannerArgs('/banner 9:16 instagram_stories')).toEqual({
      aspectRatio: '9:16',
      platform: 'instagram_stories',
    });
    expect(parseBannerArgs('/banner twitter 1:1')).toEqual({ aspectRatio: '1:1', platform: 'twitter' });
  });

  it("should use the platform's preset ratio when none is given", () => {
    expect(parseBannerArgs('/banner LinkedIn')).toEqual({ aspectRatio: '1:1', platform: 'linkedin' });
  });

  it('should strip a bot mention from the command', () => {
    expect(parseBannerArgs('/banner@campaign_bot 4:3')).toEqual({ aspectRatio: '4:3' });
  });

  it('should leave the ratio unset for platforms without a preset', () => {
    expect(parseBannerArgs('/banner myspace').aspectRatio).toBeUndefined();
  });
});
