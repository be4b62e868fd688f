// Aggregator endpoint templates; placeholders are filled in order by makeUrlToEndpoint.
export const ReportEndpoint = "organizations/{org_id}/clusters/{cluster}/users/{user_id}/report";
export const ReportMetainfoEndpoint = "organizations/{org_id}/clusters/{cluster}/users/{user_id}/report/info";
export const ReportForListOfClustersEndpoint = "organizations/{org_id}/clusters/{cluster_list}/reports";
export const ReportForListOfClustersPayloadEndpoint = "organizations/{org_id}/clusters/reports";
export const RuleEndpoint = "organizations/{org_id}/clusters/{cluster}/users/{user_id}/rules/{rule_selector}";
export const ClustersForOrganizationEndpoint = "organizations/{org_id}/clusters";

export const LikeRuleEndpoint = "clusters/{cluster}/rules/{rule_id}/error_key/{error_key}/users/{user_id}/like";
export const DislikeRuleEndpoint = "clusters/{cluster}/rules/{rule_id}/error_key/{error_key}/users/{user_id}/dislike";
export const ResetVoteOnRuleEndpoint = "clusters/{cluster}/rules/{rule_id}/error_key/{error_key}/users/{user_id}/reset_vote";
export const DisableRuleForClusterEndpoint = "clusters/{cluster}/rules/{rule_id}/error_key/{error_key}/users/{user_id}/disable";
export const EnableRuleForClusterEndpoint = "clusters/{cluster}/rules/{rule_id}/error_key/{error_key}/users/{user_id}/enable";
