// Runtime adapter interfaces. The core reads files only through these.

export type PathApi = {
  resolve: (...parts: string[]) => string;
};

export type IO = {
  readText: (path: string) => Promise<string>;
  cwd: () => string;
  path: PathApi;
};
