export type Write = (text: string) => void;

export const stdout: Write = (text) => {
  process.stdout.write(text);
};
