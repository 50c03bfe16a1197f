export {
  BannerComposer,
  composeBanner,
  buildBannerPrompt,
  resolveDimensions,
  aspectRatioForPlatform,
  hasBannerContext,
} from './composer';
export { FalImageProvider } from './fal';
export * from './presets';
export type { BannerResult, BannerSpec, BannerComposerOptions } from './composer';
export type { ImageProvider, GeneratedImage, FalConfig } from './fal';
