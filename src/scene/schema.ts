/**
 * Scene Module - Types
 */

/**
 * A scene as exposed to the HTTP layer.
 */
export type SceneState = Readonly<{
  uniqueId: string;
  name: string;
  available: boolean;
}>;
