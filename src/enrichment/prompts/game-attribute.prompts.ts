// 게임 속성별 프롬프트 템플릿
// 응답은 response-normalizer에서 후처리하므로 "단어 하나만" 같은 지시는 최선의 노력일 뿐이다.

import { AttributeKind, GENRE_VOCABULARY } from '../attribute-kind';

export function buildGenrePrompt(gameTitle: string): string {
  return `Classify the video game "${gameTitle}" into ONE single-word genre.
Choose from: ${GENRE_VOCABULARY.join(', ')}

Respond with ONLY the genre word, nothing else.

Game: ${gameTitle}
Genre:`;
}

export function buildDescriptionPrompt(gameTitle: string): string {
  return `Write a short description for the video game "${gameTitle}".
The description must be under 30 words.
Be concise and focus on the core gameplay and unique features.
Do not include the game title in the description.

Game: ${gameTitle}
Description:`;
}

export function buildPlayerModePrompt(gameTitle: string): string {
  return `Determine the player mode for the video game "${gameTitle}".

Respond with ONLY ONE of these three options:
- Singleplayer (if the game is primarily single-player only)
- Multiplayer (if the game is primarily multiplayer only)
- Both (if the game supports both single-player and multiplayer modes)

Game: ${gameTitle}
Player Mode:`;
}

const PROMPT_BUILDERS: Record<AttributeKind, (gameTitle: string) => string> = {
  [AttributeKind.Genre]: buildGenrePrompt,
  [AttributeKind.Description]: buildDescriptionPrompt,
  [AttributeKind.PlayerMode]: buildPlayerModePrompt,
};

/**
 * 속성 종류에 맞는 프롬프트를 만든다. 호출마다 새로 생성.
 */
export function buildAttributePrompt(
  kind: AttributeKind,
  gameTitle: string,
): string {
  return PROMPT_BUILDERS[kind](gameTitle);
}
