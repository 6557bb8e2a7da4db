/**
 * gcloud command generation for a deployment plan
 */

import { formatCurrency } from '../utils/units.js';
import type { DeploymentPlan } from '../types/pricing.js';

export interface CommandOptions {
  region?: string;
  zone?: string;
  projectId?: string;
  namePrefix?: string;
  topologyFile?: string;
  imageFamily?: string;
  imageProject?: string;
  bootDiskGB?: number;
}

export interface DeploymentCommands {
  commands: string[];
  instructions: string[];
  vmNames: string[];
}

const CONTAINERLAB_INSTALL = 'curl -sL https://containerlab.dev/setup | sudo -E bash -s "all"';

/**
 * Quote a value for a POSIX shell; plain words are left as they are
 */
export function shellQuote(value: string): string {
  if (/^[A-Za-z0-9_@%+=:,.\/-]+$/.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Shell commands that create the plan's instances, install ContainerLab and deploy the topology
 */
export function generateDeploymentCommands(plan: DeploymentPlan, options: CommandOptions = {}): DeploymentCommands {
  const region = options.region ?? plan.region;
  const zone = options.zone ?? `${region}-a`;
  const prefix = options.namePrefix ?? 'clab-vm';
  const topologyFile = options.topologyFile ?? 'topology.clab.yml';
  const topologyName = topologyFile.split('/').pop() ?? topologyFile;
  const vmNames = plan.offers.map((_, index) => `${prefix}-${index + 1}`);
  const firstVm = shellQuote(vmNames[0] ?? `${prefix}-1`);

  const commands: string[] = [
    '# Set your Google Cloud project and zone',
    `export PROJECT_ID=${shellQuote(options.projectId ?? 'your-project-id')}`,
    `export ZONE=${shellQuote(zone)}`,
    'gcloud config set project "$PROJECT_ID"',
    '',
  ];

  plan.offers.forEach((offer, index) => {
    commands.push(
      `# Create VM ${index + 1} (${offer.name}: ${offer.vcpus} vCPUs, ${offer.memoryGB}GB)`,
      `gcloud compute instances create ${shellQuote(vmNames[index] ?? '')} \\`,
      '    --zone="$ZONE" \\',
      `    --machine-type=${offer.name} \\`,
      `    --image-family=${shellQuote(options.imageFamily ?? 'ubuntu-2204-lts')} \\`,
      `    --image-project=${shellQuote(options.imageProject ?? 'ubuntu-os-cloud')} \\`,
      `    --boot-disk-size=${options.bootDiskGB ?? 50}GB \\`
    );
    if (plan.policy.discounted) {
      commands.push('    --provisioning-model=SPOT \\', '    --instance-termination-action=STOP \\');
    }
    commands.push('    --tags=containerlab', '');
  });

  commands.push(
    '# Install ContainerLab on each VM',
    `for vm in ${vmNames.map(shellQuote).join(' ')}; do`,
    `    gcloud compute ssh "$vm" --zone="$ZONE" --command=${shellQuote(CONTAINERLAB_INSTALL)}`,
    'done',
    '',
    '# Copy the topology to the first VM and deploy it',
    `gcloud compute scp ${shellQuote(topologyFile)} ${firstVm}:~/ --zone="$ZONE"`,
    `gcloud compute ssh ${firstVm} --zone="$ZONE" --command=${shellQuote(`sudo containerlab deploy -t ~/${shellQuote(topologyName)}`)}`
  );

  const instructions = [
    `Deployment: ${plan.strategy} on ${plan.machineType}`,
    `Total monthly cost: ${formatCurrency(plan.effectiveMonthlyCost, plan.currency)}`,
    `Region: ${region} (zone ${zone})`,
    `VM count: ${plan.instanceCount}`,
    '',
    'Steps:',
    '1. Set PROJECT_ID to your Google Cloud project',
    '2. Run the gcloud commands to create the VMs',
    '3. Install ContainerLab on every VM',
    '4. Copy and deploy the topology file',
    '',
    'Note: the Compute Engine API must be enabled in the project',
  ];
  if (plan.policy.discounted) {
    instructions.push('Note: spot VMs can be stopped by Google Cloud at any time; redeploy the lab after a preemption');
  }

  return { commands, instructions, vmNames };
}
