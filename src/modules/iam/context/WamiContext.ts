/**
 * WAMI Context
 *
 * Authenticated request context: who is calling, from which tenant and
 * instance. Immutable once built.
 */

import { WamiArn } from "../arn/WamiArn";
import { TenantPath } from "../arn/types";
import { InvalidParameterError } from "../errors/IamError";

/**
 * Temporary credential session
 */
export interface SessionInfo {
  sessionToken: string;
  /** Unix seconds */
  expiration: number;
  assumedRoleArn?: WamiArn;
}

export interface WamiContextProps {
  tenantPath: TenantPath;
  instanceId: string;
  callerArn: WamiArn;
  isRoot: boolean;
  region?: string;
  sessionInfo?: SessionInfo;
}

export class WamiContext {
  readonly tenantPath: TenantPath;
  readonly instanceId: string;
  readonly callerArn: WamiArn;
  readonly isRoot: boolean;
  readonly region?: string;
  readonly sessionInfo?: SessionInfo;

  private constructor(props: WamiContextProps) {
    this.tenantPath = props.tenantPath;
    this.instanceId = props.instanceId;
    this.callerArn = props.callerArn;
    this.isRoot = props.isRoot;
    if (props.region !== undefined) {
      this.region = props.region;
    }
    if (props.sessionInfo) {
      this.sessionInfo = Object.freeze({ ...props.sessionInfo });
    }
    Object.freeze(this);
  }

  static builder(): WamiContextBuilder {
    return new WamiContextBuilder();
  }

  /** @internal */
  static create(props: WamiContextProps): WamiContext {
    return new WamiContext(props);
  }

  /**
   * Root callers reach every tenant; others only their own subtree
   */
  canAccessTenant(target: TenantPath): boolean {
    return this.isRoot || target.startsWith(this.tenantPath);
  }

  /**
   * @param now - Unix seconds, defaults to the current time
   */
  isExpired(now: number = Math.floor(Date.now() / 1000)): boolean {
    if (!this.sessionInfo) {
      return false;
    }
    return now >= this.sessionInfo.expiration;
  }
}

export class WamiContextBuilder {
  private tenantPathValue?: TenantPath;
  private instanceIdValue?: string;
  private callerArnValue?: WamiArn;
  private isRootValue = false;
  private regionValue?: string;
  private sessionInfoValue?: SessionInfo;

  tenantPath(tenantPath: TenantPath): this {
    this.tenantPathValue = tenantPath;
    return this;
  }

  instanceId(instanceId: string): this {
    this.instanceIdValue = instanceId;
    return this;
  }

  callerArn(callerArn: WamiArn): this {
    this.callerArnValue = callerArn;
    return this;
  }

  isRoot(isRoot: boolean): this {
    this.isRootValue = isRoot;
    return this;
  }

  region(region: string): this {
    this.regionValue = region;
    return this;
  }

  sessionInfo(sessionInfo: SessionInfo): this {
    this.sessionInfoValue = sessionInfo;
    return this;
  }

  build(): WamiContext {
    if (!this.tenantPathValue) {
      throw new InvalidParameterError("tenant_path is required");
    }
    if (this.instanceIdValue === undefined) {
      throw new InvalidParameterError("instance_id is required");
    }
    if (!this.callerArnValue) {
      throw new InvalidParameterError("caller_arn is required");
    }
    if (this.instanceIdValue.trim() === "") {
      throw new InvalidParameterError("instance_id cannot be empty");
    }

    return WamiContext.create({
      tenantPath: this.tenantPathValue,
      instanceId: this.instanceIdValue,
      callerArn: this.callerArnValue,
      isRoot: this.isRootValue,
      ...(this.regionValue === undefined ? {} : { region: this.regionValue }),
      ...(this.sessionInfoValue === undefined
        ? {}
        : { sessionInfo: this.sessionInfoValue }),
    });
  }
}
