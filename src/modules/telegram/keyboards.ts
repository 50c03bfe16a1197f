import { InlineKeyboardMarkup, InlineKeyboardButton } from 'telegraf/types';
import { ASPECT_RATIO_DIMENSIONS } from '../banner/presets';
import { ConversationState } from '../conversation/types';

/**
 * Create inline keyboard for main menu
 */
export function createMainMenuKeyboard(): InlineKeyboardMarkup {
  return {
    inline_keyboard: [
      [
        { text: '📍 Context', callback_data: 'menu:context' },
        { text: '🔄 Start over', callback_data: 'menu:reset' },
      ],
      [
        { text: '🎨 Banner', callback_data: 'menu:banner' },
        { text: '❔ Help', callback_data: 'menu:help' },
      ],
    ],
  };
}

/**
 * Buttons shown under a reply once the user can ask for the campaign
 */
export function createReadyKeyboard(): InlineKeyboardMarkup {
  return {
    inline_keyboard: [
      [{ text: '🚀 Generate campaign', callback_data: 'generate' }],
      [{ text: '📍 Review context', callback_data: 'menu:context' }],
    ],
  };
}

/**
 * Create inline keyboard for what to do with a finished campaign
 */
export function createCampaignDoneKeyboard(): InlineKeyboardMarkup {
  return {
    inline_keyboard: [
      [
        { text: '🎨 Banner', callback_data: 'menu:banner' },
        { text: '🖼️ All platforms', callback_data: 'menu:banners' },
      ],
      [{ text: '🔄 New campaign', callback_data: 'menu:reset' }],
    ],
  };
}

/**
 * Create inline keyboard for banner aspect ratio selection
 */
export function createAspectRatioKeyboard(): InlineKeyboardMarkup {
  const ratios = Object.keys(ASPECT_RATIO_DIMENSIONS);
  const rows: InlineKeyboardButton[][] = [];

  for (let i = 0; i < ratios.length; i += 3) {
    rows.push(
      ratios.slice(i, i + 3).map((ratio) => ({ text: ratio, callback_data: `banner:${ratio}` }))
    );
  }

  return { inline_keyboard: rows };
}

/**
 * Pick the keyboard that fits the conversation's state, if any
 */
export function keyboardForState(state: ConversationState): InlineKeyboardMarkup | undefined {
  switch (state) {
    case ConversationState.READY_FOR_CAMPAIGN:
      return createReadyKeyboard();
    case ConversationState.GENERATING_CAMPAIGN:
      return createCampaignDoneKeyboard();
    default:
      return undefined;
  }
}
