// Primitives of the remote-control host: status codes, entity and UI
// shapes, connection states.

export const StatusCode = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  SERVER_ERROR: 500,
  NOT_IMPLEMENTED: 501,
  SERVICE_UNAVAILABLE: 503,
} as const;

export type StatusCode = (typeof StatusCode)[keyof typeof StatusCode];

export type DeviceState = "CONNECTED" | "CONNECTING" | "DISCONNECTED" | "ERROR";

export type RemoteState = "ON" | "OFF" | "UNAVAILABLE";

export type RemoteFeature = "on_off" | "send_cmd";

export type PhysicalButton = "POWER" | "VOLUME_UP" | "VOLUME_DOWN";

export interface GridSize {
  width: number;
  height: number;
}

export interface UiItem {
  type: "text";
  text: string;
  location: { x: number; y: number };
  size: GridSize;
  command?: string;
}

export interface UiPage {
  pageId: string;
  name: string;
  grid: GridSize;
  items: UiItem[];
}

export interface ButtonMapping {
  button: PhysicalButton;
  shortPress: string;
}

export type CommandParams = Record<string, unknown>;

export type CommandHandler = (
  entityId: string,
  commandId: string,
  params?: CommandParams
) => Promise<StatusCode>;

export interface RemoteAttributes {
  state: RemoteState;
}

/**
 * A remote entity as announced to the host
 */
export interface RemoteEntity {
  id: string;
  name: Record<string, string>;
  features: RemoteFeature[];
  attributes: RemoteAttributes;
  simpleCommands: string[];
  buttonMapping: ButtonMapping[];
  uiPages: UiPage[];
  handleCommand: CommandHandler;
}

export const GRID: Readonly<GridSize> = { width: 4, height: 6 };

export const uiText = (
  text: string,
  x: number,
  y: number,
  width = 1,
  height = 1,
  command?: string
): UiItem => ({
  type: "text",
  text,
  location: { x, y },
  size: { width, height },
  ...(command === undefined ? {} : { command }),
});
