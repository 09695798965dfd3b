export interface CommandDefinition {
  id: string;
  label: string;
  command: string;
  description: string;
}
