// SillyTavern DOM hooks.
export const MESSAGE_INPUT = "#send_textarea";
export const MESSAGE_CONTAINER = ".mes";
export const MESSAGE_TEXT = ".mes_text";
export const GENERATION_INDICATOR = ".typing_indicator";
export const CHARACTER_DRAWER_TOGGLE = "#rightNavHolder";
export const CHARACTER_ITEM = ".character_select";
export const CHARACTER_NAME = ".ch_name";
