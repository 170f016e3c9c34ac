import type { TimingFields } from "../crontab/timing.js";
import type { CronEntry, CronVar } from "../crontab/types.js";

export type VarValue = string | number | boolean;
export type Vars = Record<string, VarValue>;

export type TaskState = "present" | "absent";

export type CronTaskSpec = TimingFields & {
  name: string;
  job?: string;
  disabled?: boolean;
  state?: TaskState;
  /** Defaults to the play's become_user. */
  user?: string;
};

export type CronVarTaskSpec = {
  name: string;
  value?: string;
  user?: string;
  state?: TaskState;
};

export type PlaybookTask =
  | { name?: string; cron: CronTaskSpec }
  | { name?: string; cronvar: CronVarTaskSpec };

export type PlaybookFile = {
  hosts: string;
  become_user?: string;
  vars_files?: string[];
  vars?: Vars;
  backup?: boolean;
  tasks: PlaybookTask[];
};

export type HostSpec = {
  /** Hostname or IP to connect to; defaults to the inventory name. */
  address?: string;
  connection?: "local" | "ssh";
  /** ssh login user */
  login?: string;
};

export type InventoryFile = {
  hosts: Record<string, HostSpec>;
  groups: Record<string, string[]>;
};

export type JobDeclaration =
  | { state: "present"; user: string; entry: CronEntry }
  | { state: "absent"; user: string; name: string };

export type VarDeclaration =
  | { state: "present"; user: string; variable: CronVar }
  | { state: "absent"; user: string; name: string };

/** A play with templates rendered and duplicates collapsed. */
export type ResolvedPlay = {
  hosts: string;
  becomeUser: string;
  backup: boolean;
  jobs: JobDeclaration[];
  vars: VarDeclaration[];
};
