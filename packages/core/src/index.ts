export * as ChangeDescriptor from "./change_descriptor";
export * as Config from "./config_manager";
export * as Errors from "./errors";
export * as HostingPlatform from "./hosting_platform";
export * as Logger from "./logger";
export * as Schemas from "./schemas";
export * as StatusResolver from "./status_resolver";

// Submission workflow
export * as BranchAllocator from "./branch_allocator";
export * as ContentLocator from "./content_locator";
export * as Submission from "./submission";
export * as ItemSubmission from "./item_submission";
