// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

// ─── Remote Capabilities ───
// The narrow surface the traversal needs from SharePoint Online. Failures are
// signalled by throwing RemoteError with structured status fields.

import type { ComplianceFlag } from "../qualify.js";

/** One call that may be throttled. Handed to RetryPolicy, which never looks inside. */
export type RemoteOperation<T> = () => Promise<T>;

export type SiteCredentials =
  | { kind: "certificate"; clientId: string; tenant: string; thumbprint: string }
  | { kind: "certificate-file"; clientId: string; tenant: string; certificatePath: string; certificatePassword?: string }
  | { kind: "interactive"; clientId: string; tenant?: string };

/** An open connection to one site. */
export interface Session {
  readonly siteUrl: string;
}

export interface ListInfo {
  title: string;
  hidden: boolean;
  itemCount: number;
  /** Server-relative URL of the list's root folder. */
  url: string;
}

export interface RetentionLabel {
  name: string;
}

export interface ListItem {
  id: number;
  displayName: string;
  complianceFlag: ComplianceFlag;
}

export interface SiteConnector {
  connect(siteUrl: string, credentials: SiteCredentials): Promise<Session>;
  disconnect(session: Session): Promise<void>;
  listLists(session: Session): Promise<ListInfo[]>;
}

export interface LabelCapability {
  getLabel(session: Session, listTitle: string): Promise<RetentionLabel | null>;
  resetLabel(session: Session, listTitle: string): Promise<void>;
  applyLabel(session: Session, listTitle: string, labelName: string): Promise<void>;
}

export interface RecordCapability {
  listItems(session: Session, list: ListInfo): Promise<ListItem[]>;
  /** Resolves `true` when the item is no longer locked afterwards. */
  unlockItem(session: Session, list: ListInfo, itemId: number): Promise<boolean>;
}
