export interface FaceCapturedMessage {
  // base64 encoded image bytes
  image: string;
  filename?: string;
  threshold?: number;
  source?: string;
}
