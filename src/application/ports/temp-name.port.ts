export type TempNameRequest = {
  directory: string;
  prefix: string;
  suffix: string;
};

export interface TempNamePort {
  uniquePath(request: TempNameRequest): string;
}
