/**
 * Cloud environments: control-plane endpoint and the platform DNS suffixes
 * whose host names never need a custom certificate
 */
export interface CloudEnvironment {
  name: CloudEnvironmentName;
  resourceManager: string;
  appService: string;
  trafficManager: string;
}

export const CLOUD_ENVIRONMENT_NAMES = ['public', 'china', 'usgov'] as const;

export type CloudEnvironmentName = (typeof CLOUD_ENVIRONMENT_NAMES)[number];

export const CLOUD_ENVIRONMENTS: Readonly<Record<CloudEnvironmentName, CloudEnvironment>> = {
  public: {
    name: 'public',
    resourceManager: 'https://management.azure.com',
    appService: '.azurewebsites.net',
    trafficManager: '.trafficmanager.net',
  },
  china: {
    name: 'china',
    resourceManager: 'https://management.chinacloudapi.cn',
    appService: '.chinacloudsites.cn',
    trafficManager: '.trafficmanager.cn',
  },
  usgov: {
    name: 'usgov',
    resourceManager: 'https://management.usgovcloudapi.net',
    appService: '.azurewebsites.us',
    trafficManager: '.usgovtrafficmanager.net',
  },
};
