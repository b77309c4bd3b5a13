export const ENVIRONMENT_SERVICES_QUERY = `
  query EnvironmentServices($environmentId: String!, $after: String) {
    environment(id: $environmentId) {
      id
      name
      projectId
      serviceInstances(after: $after) {
        edges {
          node {
            id
            serviceId
            serviceName
            latestDeployment {
              meta
            }
            source {
              image
              repo
            }
          }
        }
        pageInfo {
          endCursor
          hasNextPage
        }
      }
    }
  }
`;

export const SERVICE_INSTANCE_UPDATE_MUTATION = `
  mutation ServiceInstanceUpdate($environmentId: String!, $serviceId: String!, $input: ServiceInstanceUpdateInput!) {
    serviceInstanceUpdate(environmentId: $environmentId, serviceId: $serviceId, input: $input)
  }
`;

export const SERVICE_INSTANCE_DEPLOY_MUTATION = `
  mutation ServiceInstanceDeploy($serviceId: String!, $environmentId: String!, $latestCommit: Boolean) {
    serviceInstanceDeploy(serviceId: $serviceId, environmentId: $environmentId, latestCommit: $latestCommit)
  }
`;
