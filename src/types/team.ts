export interface User {
  handle: string;
  display_name: string | null;
}

export interface UserWithGroups extends User {
  groups: string[];
}

export interface Group {
  id: string;
  name: string;
}

export interface AccessList {
  admins: string[];
  employees: string[];
}
