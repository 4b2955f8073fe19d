export * from "./Volume";
export * from "./VolumeEnumeratorLinux";
export * from "./VolumeEnumeratorMacos";
export * from "./VolumeEnumeratorNull";
export * from "./VolumeEnumeratorWindows";
export * from "./VolumeResolver";
