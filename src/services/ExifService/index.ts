export * from "./Exif";
export * from "./ExifDateTimeHelper";
export * from "./ExifService";
export * from "./ExifServiceExifTool";
