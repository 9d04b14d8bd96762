import type { DbClient } from "./db.js";

const SUBSCRIPTION_ID_KEY = "webhook_subscription_id";
const OWNER_EMAIL_KEY = "owner_email";
const OWNER_OBJECT_ID_KEY = "owner_object_id";

export interface SubscriptionStateStore {
  getSubscriptionId(): string | undefined;
  setSubscriptionId(subscriptionId: string): void;
}

export interface MailboxOwner {
  email: string;
  objectId: string;
}

/** Single-row integration settings, keyed by deployment id. */
export class IntegrationState implements SubscriptionStateStore {
  constructor(
    private readonly db: DbClient,
    private readonly deploymentId: string,
  ) {}

  getSubscriptionId(): string | undefined {
    return this.db.getState(this.deploymentId, SUBSCRIPTION_ID_KEY);
  }

  setSubscriptionId(subscriptionId: string): void {
    this.db.setState(this.deploymentId, SUBSCRIPTION_ID_KEY, subscriptionId);
  }

  getOwner(): MailboxOwner | undefined {
    const email = this.db.getState(this.deploymentId, OWNER_EMAIL_KEY);
    const objectId = this.db.getState(this.deploymentId, OWNER_OBJECT_ID_KEY);
    return email && objectId ? { email, objectId } : undefined;
  }

  setOwner(owner: MailboxOwner): void {
    this.db.transaction(() => {
      this.db.setState(this.deploymentId, OWNER_EMAIL_KEY, owner.email);
      this.db.setState(this.deploymentId, OWNER_OBJECT_ID_KEY, owner.objectId);
    });
  }
}
