/** The part of a multer upload the handlers read. */
export interface UploadedSheet {
  originalname: string;
  buffer: Buffer;
}
